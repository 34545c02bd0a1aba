/**
 * Workflow runtime: run submission and status lookup.
 *
 * submit() loads a recipe by name, starts a RunController for it in the
 * background and returns the run id right away. Load problems reject the
 * submit call itself, before any run exists. Finished runs stay queryable
 * from a bounded in-memory map and, when a RunStore is configured, from
 * runs.jsonl.
 */

import { randomUUID } from 'node:crypto';
import { resolve } from 'node:path';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type { RuntimeConfig } from '../config/schema.js';
import type {
  AgentHandle,
  ApprovalGate,
  CallerContext,
  EventSink,
  Recipe,
  RecipeStep,
  RunResult,
  RunSnapshot,
  StepCallback,
} from './types.js';
import { RecipeRepository } from './recipe-repository.js';
import type { RecipeEntry } from './recipe-repository.js';
import { RunController } from './run-controller.js';
import { StepExecutor } from './step-executor.js';
import { RunStore } from './run-store.js';
import { ApprovalQueue } from './approval-queue.js';
import type { ApprovalRequestHandler } from './approval-queue.js';
import { createLoggerSink, fanOut } from './events.js';
import { UnknownRunError, WorkflowsDisabledError, describeError } from './errors.js';

export interface DefaultAgent {
  name: string;
  model: string | null;
}

export interface WorkflowRuntimeOptions {
  repository: RecipeRepository;
  callback: StepCallback;
  /** Gate for steps that require approval; takes precedence over `approvals` */
  approvalGate?: ApprovalGate;
  /** Pending-approval queue whose gate is used when no approvalGate is given */
  approvals?: ApprovalQueue;
  store?: RunStore | null;
  /** Extra event sinks, called after the logger and store sinks */
  sinks?: EventSink[];
  stepTimeoutMs?: number | null;
  maxRetainedRuns?: number;
  defaultAgent?: DefaultAgent;
  enabled?: boolean;
  logger?: Logger;
}

export interface SubmitOptions {
  recipeName: string;
  vars?: Record<string, unknown>;
  callerContext?: CallerContext;
}

interface ActiveRun {
  controller: RunController;
  done: Promise<RunResult>;
}

export function newRunId(): string {
  return `wf_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}

export class WorkflowRuntime {
  readonly repository: RecipeRepository;
  readonly store: RunStore | null;
  readonly approvals: ApprovalQueue | null;
  private readonly executor: StepExecutor;
  private readonly sink: EventSink;
  private readonly maxRetainedRuns: number;
  private readonly defaultAgent: DefaultAgent;
  private readonly enabled: boolean;
  private readonly logger: Logger;
  private readonly active = new Map<string, ActiveRun>();
  private readonly finished = new Map<string, RunResult>();

  constructor(options: WorkflowRuntimeOptions) {
    this.repository = options.repository;
    this.store = options.store ?? null;
    this.approvals = options.approvals ?? null;
    this.logger = options.logger ?? silentLogger;
    this.maxRetainedRuns = options.maxRetainedRuns ?? 100;
    this.defaultAgent = options.defaultAgent ?? { name: 'default', model: null };
    this.enabled = options.enabled ?? true;
    this.executor = new StepExecutor({
      callback: options.callback,
      approvalGate: options.approvalGate ?? this.approvals?.gate,
      stepTimeoutMs: options.stepTimeoutMs,
      logger: this.logger,
    });

    const sinks: EventSink[] = [createLoggerSink(this.logger)];
    if (this.store) sinks.push(this.store.sink());
    sinks.push(...(options.sinks ?? []));
    this.sink = fanOut(sinks, this.logger);
  }

  /**
   * Build a runtime from a loaded config. Relative directories resolve
   * against `baseDir`. Without an explicit approvalGate, approvals go
   * through an ApprovalQueue using the configured timeout and session key.
   */
  static fromConfig(
    config: RuntimeConfig,
    options: {
      callback: StepCallback;
      approvalGate?: ApprovalGate;
      onApprovalRequest?: ApprovalRequestHandler;
      sinks?: EventSink[];
      logger?: Logger;
      baseDir?: string;
    },
  ): WorkflowRuntime {
    const baseDir = options.baseDir ?? process.cwd();
    const { workflows, agent } = config;
    const logger = options.logger ?? silentLogger;

    const approvals = options.approvalGate
      ? undefined
      : new ApprovalQueue({
          timeoutMs: workflows.approval_timeout_ms,
          sessionKey: workflows.approval_session_key,
          onRequest: options.onApprovalRequest,
          logger,
        });

    return new WorkflowRuntime({
      repository: new RecipeRepository(resolve(baseDir, workflows.path)),
      callback: options.callback,
      approvalGate: options.approvalGate,
      approvals,
      store: workflows.runs_dir === null ? null : new RunStore(resolve(baseDir, workflows.runs_dir), logger),
      sinks: options.sinks,
      stepTimeoutMs: workflows.step_timeout_ms,
      maxRetainedRuns: workflows.max_retained_runs,
      defaultAgent: { name: agent.name, model: agent.model },
      enabled: workflows.enabled,
      logger,
    });
  }

  /**
   * Load a recipe by name or path and start running it.
   *
   * @throws {WorkflowsDisabledError} When workflows are switched off
   * @throws {RecipeNotFoundError} When no recipe file matches
   * @throws {RecipeError} When the recipe is invalid
   */
  async submit(options: SubmitOptions): Promise<string> {
    if (!this.enabled) throw new WorkflowsDisabledError();
    const recipe = await this.repository.load(options.recipeName);
    return this.runRecipe(recipe, options.vars, options.callerContext);
  }

  /** Start an already-loaded recipe. Returns the new run id. */
  runRecipe(
    recipe: Recipe,
    vars: Record<string, unknown> = {},
    callerContext: CallerContext = {},
  ): string {
    if (!this.enabled) throw new WorkflowsDisabledError();

    const runId = newRunId();
    const controller = new RunController({
      runId,
      recipe,
      vars,
      executor: this.executor,
      agentFor: (step) => this.agentFor(recipe, step, callerContext),
      sink: this.sink,
      logger: this.logger,
    });

    const done = controller.start().then((result) => this.finish(result));
    void done.catch((err: unknown) => {
      this.active.delete(runId);
      this.logger.error('Workflow run crashed', { run_id: runId, error: describeError(err) });
    });

    this.active.set(runId, { controller, done });
    return runId;
  }

  /** Live snapshot of a run, or null when the id is unknown. */
  getRun(runId: string): RunSnapshot | null {
    const active = this.active.get(runId);
    if (active) return active.controller.snapshot();

    const result = this.finished.get(runId);
    if (!result) return null;
    return {
      run_id: result.run_id,
      recipe_name: result.recipe_name,
      mode: result.mode,
      status: result.status,
      steps: result.steps,
      result,
    };
  }

  /**
   * Resolve with the run's result once it finishes.
   *
   * @throws {UnknownRunError} When the id is neither active nor retained
   */
  async waitForRun(runId: string): Promise<RunResult> {
    const active = this.active.get(runId);
    if (active) return active.done;

    const result = this.finished.get(runId) ?? (await this.store?.getRun(runId)) ?? null;
    if (!result) throw new UnknownRunError(runId);
    return result;
  }

  /** Request cancellation. False when the run is unknown or already settling. */
  cancel(runId: string): boolean {
    return this.active.get(runId)?.controller.cancel() ?? false;
  }

  activeRuns(): string[] {
    return [...this.active.keys()];
  }

  listRecipes(): Promise<RecipeEntry[]> {
    return this.repository.list();
  }

  /** Wait for pending store writes. */
  async flush(): Promise<void> {
    await this.store?.flush();
  }

  private agentFor(recipe: Recipe, step: RecipeStep, caller: CallerContext): AgentHandle {
    return {
      name: step.agent ?? caller.agent ?? this.defaultAgent.name,
      session_key: `workflow:${recipe.name}:${step.id}`,
      model: caller.model ?? this.defaultAgent.model,
      channel: caller.channel ?? 'system',
      chat_id: caller.chat_id ?? 'workflow',
    };
  }

  private async finish(result: RunResult): Promise<RunResult> {
    this.active.delete(result.run_id);
    this.finished.set(result.run_id, result);

    // Oldest first, so trim from the front
    for (const runId of this.finished.keys()) {
      if (this.finished.size <= this.maxRetainedRuns) break;
      this.finished.delete(runId);
    }

    if (this.store) {
      try {
        await this.store.appendResult(result);
      } catch (err) {
        this.logger.warn('Failed to persist workflow run result', {
          run_id: result.run_id,
          error: describeError(err),
        });
      }
    }

    return result;
  }
}

