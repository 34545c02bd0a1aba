/**
 * Runs a single recipe step: approval gate, attempts, fixed backoff.
 *
 * The executor never throws for step-level problems. Every outcome is
 * written to the run's RunState and the final StepResult is returned.
 * Run cancellation is observed while waiting for approval and between
 * attempts; an agent call that is already in flight is left to finish.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from '../logging/logger.js';
import { silentLogger } from '../logging/logger.js';
import type {
  AgentHandle,
  ApprovalDecision,
  ApprovalGate,
  RecipeStep,
  StepCallback,
  StepResult,
} from './types.js';
import type { RunState } from './run-state.js';
import { StepExecutionError, StepTimeoutError, describeError } from './errors.js';

/** Longest prompt excerpt handed to an approval gate. */
export const APPROVAL_PREVIEW_LENGTH = 500;

export interface StepExecutorOptions {
  callback: StepCallback;
  approvalGate?: ApprovalGate;
  /** Bounded wait per attempt; null or undefined waits forever */
  stepTimeoutMs?: number | null;
  logger?: Logger;
}

export interface StepRunContext {
  state: RunState;
  /** Aborts when the run is cancelled */
  signal: AbortSignal;
}

const ABORTED = Symbol('aborted');

/**
 * Settle with the work's value, or with ABORTED as soon as the signal fires.
 */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T | typeof ABORTED> {
  if (signal.aborted) return Promise.resolve(ABORTED);
  return new Promise((resolve, reject) => {
    const onAbort = (): void => resolve(ABORTED);
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

export class StepExecutor {
  private readonly callback: StepCallback;
  private readonly approvalGate?: ApprovalGate;
  private readonly stepTimeoutMs: number | null;
  private readonly logger: Logger;

  constructor(options: StepExecutorOptions) {
    this.callback = options.callback;
    this.approvalGate = options.approvalGate;
    this.stepTimeoutMs = options.stepTimeoutMs ?? null;
    this.logger = options.logger ?? silentLogger;
  }

  async runStep(
    step: RecipeStep,
    prompt: string,
    agent: AgentHandle,
    context: StepRunContext,
  ): Promise<StepResult> {
    const blocked = await this.approve(step, prompt, context);
    if (blocked) return blocked;
    return this.execute(step, prompt, agent, context);
  }

  /**
   * Everything that happens before the first attempt: the cancellation and
   * empty-prompt checks, then the approval gate when the step asks for one.
   * Returns the terminal result when the step must not run, or null when it
   * is cleared to run. A cleared step that waited on approval stays
   * `awaiting_approval` until `execute` starts its first attempt.
   */
  async approve(step: RecipeStep, prompt: string, { state, signal }: StepRunContext): Promise<StepResult | null> {
    if (signal.aborted) {
      return state.transition(step.id, 'cancelled', {
        error: { kind: 'Cancelled', message: 'Run was cancelled before the step started' },
      });
    }

    if (!prompt.trim()) {
      return state.transition(step.id, 'skipped', {
        error: { kind: 'EmptyPrompt', message: `Prompt for step "${step.id}" rendered to empty text` },
      });
    }

    if (!step.require_approval) return null;
    return this.awaitApproval(step, prompt, state, signal);
  }

  /** Run the attempts of a step that `approve` cleared. */
  async execute(
    step: RecipeStep,
    prompt: string,
    agent: AgentHandle,
    { state, signal }: StepRunContext,
  ): Promise<StepResult> {
    if (signal.aborted) {
      return state.transition(step.id, 'cancelled', {
        error: { kind: 'Cancelled', message: 'Run was cancelled before the step started' },
      });
    }
    return this.attempts(step, prompt, agent, state, signal);
  }

  /**
   * Wait on the approval gate. Returns the terminal result when the step
   * must not run, or null once it is approved.
   */
  private async awaitApproval(
    step: RecipeStep,
    prompt: string,
    state: RunState,
    signal: AbortSignal,
  ): Promise<StepResult | null> {
    if (!this.approvalGate) {
      this.logger.warn(`No approval gate configured; approving step ${step.id}`, {
        run_id: state.runId,
      });
      return null;
    }

    state.transition(step.id, 'awaiting_approval');

    let decision: ApprovalDecision | typeof ABORTED;
    try {
      decision = await raceAbort(
        this.approvalGate(
          {
            run_id: state.runId,
            step_id: step.id,
            recipe_name: state.recipe.name,
            prompt_preview: prompt.slice(0, APPROVAL_PREVIEW_LENGTH),
          },
          signal,
        ),
        signal,
      );
    } catch (err) {
      this.logger.warn(`Approval gate failed for step ${step.id}; treating as denied`, {
        run_id: state.runId,
        error: describeError(err),
      });
      decision = 'denied';
    }

    if (decision === ABORTED) {
      return state.transition(step.id, 'cancelled', {
        error: { kind: 'Cancelled', message: 'Run was cancelled while waiting for approval' },
      });
    }

    if (decision !== 'approved') {
      return state.transition(step.id, 'failed', {
        error: { kind: 'ApprovalDenied', message: `Step "${step.id}" was not approved` },
      });
    }

    return null;
  }

  private async attempts(
    step: RecipeStep,
    prompt: string,
    agent: AgentHandle,
    state: RunState,
    signal: AbortSignal,
  ): Promise<StepResult> {
    const maxAttempts = step.retry_max_attempts;
    let lastError = 'Step did not run';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const approved = state.statusOf(step.id) === 'awaiting_approval';
      state.transition(step.id, 'running', { attempt_count: attempt });
      // Leaving awaiting_approval emits step.approved, not step.started
      if (approved) state.notify(step.id, 'step.started', { attempt_count: attempt });

      try {
        const output = await this.invoke(agent, prompt);
        const trimmed = output.trim();
        if (!trimmed) {
          throw new StepExecutionError('Agent returned an empty response');
        }
        return state.transition(step.id, 'succeeded', { output: trimmed });
      } catch (err) {
        lastError = describeError(err);
      }

      if (attempt < maxAttempts) {
        state.notify(step.id, 'step.retrying', {
          attempt,
          next_attempt: attempt + 1,
          backoff_ms: step.retry_backoff_ms,
          error: lastError,
        });
        const slept = await this.backoff(step.retry_backoff_ms, signal);
        if (!slept) {
          return state.transition(step.id, 'cancelled', {
            error: { kind: 'Cancelled', message: 'Run was cancelled while waiting to retry' },
          });
        }
      }
    }

    return state.transition(step.id, 'failed', {
      error: { kind: 'StepExecutionError', message: lastError },
    });
  }

  /**
   * One agent call. With a step timeout the call gets its own signal,
   * aborted when the timeout fires.
   */
  private async invoke(agent: AgentHandle, prompt: string): Promise<string> {
    const controller = new AbortController();
    const timeoutMs = this.stepTimeoutMs;

    if (timeoutMs === null) {
      return this.callback(agent, prompt, controller.signal);
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new StepTimeoutError(timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([this.callback(agent, prompt, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Sleep for the backoff. Resolves false when the run was cancelled. */
  private async backoff(ms: number, signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) return false;
    if (ms <= 0) return true;
    try {
      await delay(ms, undefined, { signal });
      return true;
    } catch (err) {
      if (signal.aborted) return false;
      throw err;
    }
  }
}
