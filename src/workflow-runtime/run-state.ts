/**
 * Mutable state of one workflow run.
 *
 * RunState is the only writer of step results for its run. Every status
 * change goes through transition(), which rejects backwards moves and
 * emits the matching lifecycle event, so schedulers and the step executor
 * never touch the results map directly.
 */

import type {
  EventSink,
  Recipe,
  RunStatus,
  StepError,
  StepResult,
  StepStatus,
  WorkflowEventType,
} from './types.js';
import { isTerminalRunStatus, isTerminalStepStatus } from './types.js';
import { createEvent } from './events.js';

const STEP_TRANSITIONS: Record<StepStatus, readonly StepStatus[]> = {
  pending: ['running', 'awaiting_approval', 'skipped', 'cancelled'],
  awaiting_approval: ['running', 'failed', 'skipped', 'cancelled'],
  running: ['running', 'succeeded', 'failed', 'cancelled'],
  succeeded: [],
  failed: [],
  skipped: [],
  cancelled: [],
};

const RUN_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  pending: ['running', 'cancelling'],
  running: ['cancelling', 'completed', 'failed'],
  cancelling: ['cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

const STEP_EVENTS: Partial<Record<StepStatus, WorkflowEventType>> = {
  awaiting_approval: 'step.awaiting_approval',
  succeeded: 'step.succeeded',
  failed: 'step.failed',
  skipped: 'step.skipped',
  cancelled: 'step.cancelled',
};

export interface StepTransition {
  output?: string;
  error?: StepError;
  attempt_count?: number;
  detail?: Record<string, unknown>;
}

export class RunState {
  private readonly results = new Map<string, StepResult>();
  private readonly stepOutputs = new Map<string, string>();
  private readonly scopedVars: Readonly<Record<string, unknown>>;
  private currentStatus: RunStatus = 'pending';

  constructor(
    readonly runId: string,
    readonly recipe: Recipe,
    vars: Readonly<Record<string, unknown>>,
    private readonly emit: EventSink,
  ) {
    this.scopedVars = Object.freeze({
      workflow_name: recipe.name,
      run_id: runId,
      ...vars,
    });
  }

  get status(): RunStatus {
    return this.currentStatus;
  }

  /** Caller vars plus workflow_name and run_id (caller values win). */
  get vars(): Readonly<Record<string, unknown>> {
    return this.scopedVars;
  }

  /** Outputs of succeeded steps, keyed by step id. */
  get outputs(): ReadonlyMap<string, string> {
    return this.stepOutputs;
  }

  setStatus(next: RunStatus, detail: Record<string, unknown> = {}): void {
    if (next === this.currentStatus) return;
    if (!RUN_TRANSITIONS[this.currentStatus].includes(next)) {
      throw new Error(`Run ${this.runId} cannot move from ${this.currentStatus} to ${next}`);
    }
    this.currentStatus = next;

    if (next === 'running') {
      this.emit(createEvent(this.runId, 'run.started', undefined, { recipe: this.recipe.name, mode: this.recipe.mode, ...detail }));
    } else if (next === 'cancelling') {
      this.emit(createEvent(this.runId, 'run.cancelling', undefined, detail));
    } else if (isTerminalRunStatus(next)) {
      this.emit(createEvent(this.runId, 'run.finished', undefined, { status: next, ...detail }));
    }
  }

  /** Current result for a step, or undefined if it has not been touched. */
  get(stepId: string): StepResult | undefined {
    const result = this.results.get(stepId);
    return result ? { ...result } : undefined;
  }

  statusOf(stepId: string): StepStatus {
    return this.results.get(stepId)?.status ?? 'pending';
  }

  isStepTerminal(stepId: string): boolean {
    return isTerminalStepStatus(this.statusOf(stepId));
  }

  /**
   * Move a step to a new status. Results are created on first touch.
   *
   * @throws Error on a backwards or otherwise illegal transition
   */
  transition(stepId: string, next: StepStatus, change: StepTransition = {}): StepResult {
    const current = this.results.get(stepId) ?? this.blank(stepId);
    if (!STEP_TRANSITIONS[current.status].includes(next)) {
      throw new Error(`Step ${stepId} cannot move from ${current.status} to ${next}`);
    }

    const now = new Date().toISOString();
    const updated: StepResult = {
      ...current,
      status: next,
      output: change.output ?? current.output,
      error: change.error ?? current.error,
      attempt_count: change.attempt_count ?? current.attempt_count,
      started_at:
        current.started_at ?? (next === 'running' || next === 'awaiting_approval' ? now : null),
      finished_at: isTerminalStepStatus(next) ? now : null,
    };
    this.results.set(stepId, updated);

    if (next === 'succeeded' && updated.output !== null) {
      this.stepOutputs.set(stepId, updated.output);
    }

    const type = this.eventFor(current.status, next);
    if (type) {
      this.emit(createEvent(this.runId, type, stepId, this.eventDetail(updated, change.detail)));
    }

    return { ...updated };
  }

  /** Emit an event that is not tied to a status change (e.g. a retry). */
  notify(stepId: string, type: WorkflowEventType, detail: Record<string, unknown> = {}): void {
    this.emit(createEvent(this.runId, type, stepId, detail));
  }

  /** Results for every step in declaration order; untouched steps read as pending. */
  stepResults(): StepResult[] {
    return this.recipe.steps.map((step) => this.get(step.id) ?? this.blank(step.id));
  }

  private eventFor(from: StepStatus, to: StepStatus): WorkflowEventType | undefined {
    if (to === 'running') {
      if (from === 'pending') return 'step.started';
      if (from === 'awaiting_approval') return 'step.approved';
      return undefined;
    }
    return STEP_EVENTS[to];
  }

  private eventDetail(result: StepResult, extra: Record<string, unknown> = {}): Record<string, unknown> {
    return {
      attempt_count: result.attempt_count,
      ...(result.error ? { error_kind: result.error.kind, error: result.error.message } : {}),
      ...extra,
    };
  }

  private blank(stepId: string): StepResult {
    return {
      step_id: stepId,
      status: 'pending',
      output: null,
      error: null,
      attempt_count: 0,
      started_at: null,
      finished_at: null,
    };
  }
}
