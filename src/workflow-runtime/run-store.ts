/**
 * JSONL append-log store for workflow events and run results.
 *
 * Two files live under the runs directory:
 * - events.jsonl: every lifecycle event, category 'workflow-events'
 * - runs.jsonl: one RunResult per finished run, category 'workflow-runs'
 *
 * Lines use the envelope format ({timestamp, category, data}). Writes are
 * serialized through a write queue; a failed write is logged and does not
 * block the ones queued after it. Reads skip lines that fail to parse or
 * validate.
 */

import { appendFile, readFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import { RunResultSchema, WorkflowEventSchema } from './types.js';
import type { EventSink, RunResult, WorkflowEvent } from './types.js';
import { describeError } from './errors.js';

export const EVENTS_FILENAME = 'events.jsonl';
export const RUNS_FILENAME = 'runs.jsonl';

type Category = 'workflow-events' | 'workflow-runs';

function envelopeSchema<T extends z.ZodTypeAny>(category: Category, data: T) {
  return z.object({
    timestamp: z.number(),
    category: z.literal(category),
    data,
  });
}

const EventEnvelopeSchema = envelopeSchema('workflow-events', WorkflowEventSchema);
const RunEnvelopeSchema = envelopeSchema('workflow-runs', RunResultSchema);

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

export class RunStore {
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly runsDir: string,
    private readonly logger: Logger = silentLogger,
  ) {}

  get eventsPath(): string {
    return join(this.runsDir, EVENTS_FILENAME);
  }

  get runsPath(): string {
    return join(this.runsDir, RUNS_FILENAME);
  }

  appendEvent(event: WorkflowEvent): Promise<void> {
    return this.append(this.eventsPath, 'workflow-events', event);
  }

  appendResult(result: RunResult): Promise<void> {
    return this.append(this.runsPath, 'workflow-runs', result);
  }

  /**
   * Event sink that queues each event for writing. Write failures are
   * logged, never thrown back into the run.
   */
  sink(): EventSink {
    return (event) => {
      this.appendEvent(event).catch((err: unknown) => {
        this.logger.warn('Failed to persist workflow event', {
          run_id: event.run_id,
          type: event.type,
          error: describeError(err),
        });
      });
    };
  }

  /** Resolves once every write queued so far has settled. */
  async flush(): Promise<void> {
    await this.writeQueue;
  }

  async readEvents(runId?: string): Promise<WorkflowEvent[]> {
    const events = await this.readAll<WorkflowEvent>(this.eventsPath, EventEnvelopeSchema);
    return runId === undefined ? events : events.filter((e) => e.run_id === runId);
  }

  async readResults(): Promise<RunResult[]> {
    return this.readAll<RunResult>(this.runsPath, RunEnvelopeSchema);
  }

  /** Latest stored result for a run, or null. */
  async getRun(runId: string): Promise<RunResult | null> {
    const results = await this.readResults();
    for (let i = results.length - 1; i >= 0; i--) {
      if (results[i].run_id === runId) return results[i];
    }
    return null;
  }

  /** Stored results, newest first, optionally for one recipe. */
  async listRuns(options: { recipeName?: string; limit?: number } = {}): Promise<RunResult[]> {
    const results = await this.readResults();
    const matching = options.recipeName
      ? results.filter((r) => r.recipe_name === options.recipeName)
      : results;
    const newestFirst = matching.reverse();
    return options.limit === undefined ? newestFirst : newestFirst.slice(0, options.limit);
  }

  private append(filePath: string, category: Category, data: unknown): Promise<void> {
    const envelope = { timestamp: Date.now(), category, data };

    const write = async (): Promise<void> => {
      await mkdir(this.runsDir, { recursive: true });
      await appendFile(filePath, JSON.stringify(envelope) + '\n', 'utf-8');
    };

    const queued = this.writeQueue.then(write);
    // Keep the queue alive past a failed write; the caller still sees the error
    this.writeQueue = queued.catch(() => undefined);
    return queued;
  }

  private async readAll<T>(
    filePath: string,
    schema: z.ZodType<{ data: T }, z.ZodTypeDef, unknown>,
  ): Promise<T[]> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const entries: T[] = [];
    for (const line of content.split(/\r?\n/)) {
      if (line.trim() === '') continue;
      const result = schema.safeParse(parseLine(line));
      if (result.success) {
        entries.push(result.data.data);
      }
    }
    return entries;
  }
}
