/**
 * Lifecycle of one workflow run.
 *
 * The controller owns the run's RunState and its cancellation signal,
 * hands both to the scheduler the recipe's mode selects, and turns the
 * settled step results into a RunResult.
 */

import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type {
  AgentHandle,
  EventSink,
  Recipe,
  RecipeStep,
  RunResult,
  RunSnapshot,
  TerminalRunStatus,
} from './types.js';
import { isTerminalRunStatus, isTerminalStepStatus } from './types.js';
import { RunState } from './run-state.js';
import type { StepExecutor } from './step-executor.js';
import type { Scheduler } from './linear-scheduler.js';
import { runLinear } from './linear-scheduler.js';
import { runDag } from './dag-scheduler.js';
import { describeError } from './errors.js';

export interface RunControllerOptions {
  runId: string;
  recipe: Recipe;
  vars?: Readonly<Record<string, unknown>>;
  executor: StepExecutor;
  agentFor: (step: RecipeStep) => AgentHandle;
  sink?: EventSink;
  logger?: Logger;
}

const SCHEDULERS: Record<Recipe['mode'], Scheduler> = {
  linear: runLinear,
  dag: runDag,
};

export class RunController {
  readonly state: RunState;
  private readonly abort = new AbortController();
  private readonly executor: StepExecutor;
  private readonly agentFor: (step: RecipeStep) => AgentHandle;
  private readonly logger: Logger;
  private running: Promise<RunResult> | null = null;
  private result: RunResult | null = null;

  constructor(options: RunControllerOptions) {
    this.executor = options.executor;
    this.agentFor = options.agentFor;
    this.logger = options.logger ?? silentLogger;
    this.state = new RunState(
      options.runId,
      options.recipe,
      options.vars ?? {},
      options.sink ?? (() => {}),
    );
  }

  get runId(): string {
    return this.state.runId;
  }

  /**
   * Drive the run to completion. Calling start() again returns the same
   * promise. Never rejects for step-level failures.
   */
  start(): Promise<RunResult> {
    this.running ??= this.execute();
    return this.running;
  }

  /**
   * Request cancellation. Returns false when the run already finished or
   * is already cancelling.
   */
  cancel(): boolean {
    const status = this.state.status;
    if (status === 'cancelling' || isTerminalRunStatus(status)) return false;
    this.state.setStatus('cancelling');
    this.abort.abort();
    return true;
  }

  snapshot(): RunSnapshot {
    const { recipe } = this.state;
    return {
      run_id: this.state.runId,
      recipe_name: recipe.name,
      mode: recipe.mode,
      status: this.state.status,
      steps: this.state.stepResults(),
      result: this.result,
    };
  }

  private async execute(): Promise<RunResult> {
    const { state } = this;
    const startedAt = new Date();

    if (state.status === 'pending') {
      state.setStatus('running');
    }

    let crashed = false;
    try {
      await SCHEDULERS[state.recipe.mode]({
        state,
        executor: this.executor,
        agentFor: this.agentFor,
        signal: this.abort.signal,
        logger: this.logger,
      });
    } catch (err) {
      crashed = true;
      this.logger.error('Workflow scheduler failed', { run_id: state.runId, error: describeError(err) });
      this.abort.abort();
      this.abandonUnfinished(describeError(err));
    }

    const steps = state.stepResults();
    let status: TerminalRunStatus;
    if (state.status === 'cancelling') {
      status = 'cancelled';
    } else if (crashed || steps.some((s) => s.status === 'failed')) {
      status = 'failed';
    } else {
      status = 'completed';
    }

    const finishedAt = new Date();
    const durationMs = finishedAt.getTime() - startedAt.getTime();
    this.result = {
      run_id: state.runId,
      recipe_name: state.recipe.name,
      mode: state.recipe.mode,
      status,
      started_at: startedAt.toISOString(),
      finished_at: finishedAt.toISOString(),
      duration_ms: durationMs,
      steps,
    };
    state.setStatus(status, { duration_ms: durationMs });
    return this.result;
  }

  /** Close out steps a crashed scheduler left behind. */
  private abandonUnfinished(reason: string): void {
    for (const step of this.state.recipe.steps) {
      const status = this.state.statusOf(step.id);
      if (isTerminalStepStatus(status)) continue;

      if (status === 'pending') {
        this.state.transition(step.id, 'skipped', {
          error: { kind: 'WorkflowStopped', message: `Not started: ${reason}` },
        });
      } else {
        this.state.transition(step.id, 'failed', {
          error: { kind: 'StepExecutionError', message: reason },
        });
      }
    }
  }
}
