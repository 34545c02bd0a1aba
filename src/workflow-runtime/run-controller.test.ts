/**
 * Tests for RunController.
 *
 * Covers:
 * - Result shape and lifecycle events of a completed run
 * - A failed step fails the run, even under on_failure: continue
 * - Dependency graphs: a failed branch and a denied approval skip their dependents
 * - start() is idempotent
 * - cancel() during backoff, before start, and after finish
 * - A crashing scheduler closes out unfinished steps
 * - snapshot() reflects live state and the final result
 */

import { describe, it, expect, vi } from 'vitest';
import { RunController } from './run-controller.js';
import { StepExecutor } from './step-executor.js';
import { loadRecipe } from './recipe-parser.js';
import type { AgentHandle, ApprovalGate, StepCallback, WorkflowEvent } from './types.js';
import type { Logger } from '../logging/logger.js';

const AGENT: AgentHandle = {
  name: 'default',
  session_key: 'workflow:test',
  model: null,
  channel: 'system',
  chat_id: 'workflow',
};

function controllerFor(
  raw: Record<string, unknown>,
  callback: StepCallback,
  overrides: { agentFor?: () => AgentHandle; logger?: Logger; approvalGate?: ApprovalGate } = {},
) {
  const events: WorkflowEvent[] = [];
  const controller = new RunController({
    runId: 'wf_test',
    recipe: loadRecipe({ name: 'test', ...raw }),
    executor: new StepExecutor({ callback, approvalGate: overrides.approvalGate }),
    agentFor: overrides.agentFor ?? (() => AGENT),
    sink: (e) => events.push(e),
    logger: overrides.logger,
  });
  return { controller, events, types: () => events.map((e) => e.type) };
}

// ============================================================================
// Completion
// ============================================================================

describe('RunController - completion', () => {
  it('completes a run and reports every step', async () => {
    const { controller, events, types } = controllerFor(
      { steps: [{ id: 'a', prompt: 'x' }, { id: 'b', prompt: 'y' }] },
      async (_agent, prompt) => `ok ${prompt}`,
    );

    const result = await controller.start();

    expect(result).toMatchObject({ run_id: 'wf_test', recipe_name: 'test', mode: 'linear', status: 'completed' });
    expect(result.steps.map((s) => [s.step_id, s.status, s.output])).toEqual([
      ['a', 'succeeded', 'ok x'],
      ['b', 'succeeded', 'ok y'],
    ]);
    expect(result.duration_ms).toBeGreaterThanOrEqual(0);
    expect(types()).toEqual([
      'run.started',
      'step.started',
      'step.succeeded',
      'step.started',
      'step.succeeded',
      'run.finished',
    ]);
    expect(events[0].detail).toEqual({ recipe: 'test', mode: 'linear' });
    expect(events[5].detail).toEqual({ status: 'completed', duration_ms: result.duration_ms });
  });

  it('fails the run when any step failed', async () => {
    const { controller } = controllerFor(
      {
        steps: [
          { id: 'a', prompt: 'x', on_failure: 'continue' },
          { id: 'b', prompt: 'y' },
        ],
      },
      async (_agent, prompt) => {
        if (prompt === 'x') throw new Error('nope');
        return 'fine';
      },
    );

    const result = await controller.start();

    expect(result.status).toBe('failed');
    expect(result.steps.map((s) => s.status)).toEqual(['failed', 'succeeded']);
  });

  it('returns the same promise from repeated start() calls', async () => {
    const callback = vi.fn<StepCallback>().mockResolvedValue('ok');
    const { controller } = controllerFor({ steps: [{ prompt: 'x' }] }, callback);

    const first = controller.start();
    const second = controller.start();

    expect(second).toBe(first);
    await first;
    expect(callback).toHaveBeenCalledTimes(1);
  });
});

// ============================================================================
// Dependency graphs
// ============================================================================

describe('RunController - dependency graphs', () => {
  it('finishes sibling branches when one fails with continue and skips the join', async () => {
    const calls: string[] = [];
    const { controller } = controllerFor(
      {
        mode: 'dag',
        max_parallel: 3,
        steps: [
          { id: 'collect', prompt: 'collect tickets' },
          { id: 'support', prompt: 'support view of {collect_output}', depends_on: ['collect'], on_failure: 'continue' },
          { id: 'growth', prompt: 'growth view of {collect_output}', depends_on: ['collect'] },
          { id: 'finance', prompt: 'finance view of {collect_output}', depends_on: ['collect'] },
          { id: 'merge', prompt: 'merge', depends_on: ['support', 'growth', 'finance'] },
        ],
      },
      async (_agent, prompt) => {
        calls.push(prompt);
        if (prompt.startsWith('support')) throw new Error('support agent offline');
        return 'tickets';
      },
    );

    const result = await controller.start();

    expect(result.status).toBe('failed');
    expect(calls).toEqual([
      'collect tickets',
      'support view of tickets',
      'growth view of tickets',
      'finance view of tickets',
    ]);
    expect(result.steps.map((s) => [s.step_id, s.status])).toEqual([
      ['collect', 'succeeded'],
      ['support', 'failed'],
      ['growth', 'succeeded'],
      ['finance', 'succeeded'],
      ['merge', 'skipped'],
    ]);
    expect(result.steps[4].error).toEqual({
      kind: 'DependencyFailed',
      message: 'Skipped because dependency "support" did not succeed',
    });
  });

  it('fails a denied step and skips its dependents', async () => {
    const gate = vi.fn<ApprovalGate>().mockResolvedValue('denied');
    const callback = vi.fn<StepCallback>().mockResolvedValue('done');
    const { controller, types } = controllerFor(
      {
        mode: 'dag',
        steps: [
          { id: 'draft', prompt: 'draft' },
          { id: 'send', prompt: 'send {draft_output}', depends_on: ['draft'], require_approval: true },
          { id: 'notify', prompt: 'notify', depends_on: ['send'] },
        ],
      },
      callback,
      { approvalGate: gate },
    );

    const result = await controller.start();

    expect(result.status).toBe('failed');
    expect(gate).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(result.steps.map((s) => [s.step_id, s.status, s.error?.kind ?? null])).toEqual([
      ['draft', 'succeeded', null],
      ['send', 'failed', 'ApprovalDenied'],
      ['notify', 'skipped', 'DependencyFailed'],
    ]);
    expect(types()).toEqual([
      'run.started',
      'step.started',
      'step.succeeded',
      'step.awaiting_approval',
      'step.failed',
      'step.skipped',
      'run.finished',
    ]);
  });
});

// ============================================================================
// Cancellation
// ============================================================================

describe('RunController - cancellation', () => {
  it('cancels a run waiting to retry', async () => {
    const { controller, types } = controllerFor(
      {
        steps: [
          { id: 'a', prompt: 'x', retry_max_attempts: 3, retry_backoff_ms: 10_000 },
          { id: 'b', prompt: 'y' },
        ],
      },
      async () => {
        throw new Error('down');
      },
    );

    const running = controller.start();
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(controller.cancel()).toBe(true);
    expect(controller.cancel()).toBe(false);

    const result = await running;
    expect(result.status).toBe('cancelled');
    expect(result.steps.map((s) => s.status)).toEqual(['cancelled', 'cancelled']);
    expect(types()).toContain('run.cancelling');
    expect(types().at(-1)).toBe('run.finished');
  });

  it('cancels a run that has not started', async () => {
    const callback = vi.fn<StepCallback>();
    const { controller, types } = controllerFor({ steps: [{ id: 'a', prompt: 'x' }] }, callback);

    expect(controller.cancel()).toBe(true);
    const result = await controller.start();

    expect(result.status).toBe('cancelled');
    expect(callback).not.toHaveBeenCalled();
    expect(types()).toEqual(['run.cancelling', 'step.cancelled', 'run.finished']);
  });

  it('refuses to cancel a finished run', async () => {
    const { controller } = controllerFor({ steps: [{ prompt: 'x' }] }, async () => 'ok');
    await controller.start();
    expect(controller.cancel()).toBe(false);
  });
});

// ============================================================================
// Scheduler failure and snapshots
// ============================================================================

describe('RunController - scheduler failure', () => {
  it('closes out unfinished steps when the scheduler throws', async () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const { controller } = controllerFor(
      { steps: [{ id: 'a', prompt: 'x' }, { id: 'b', prompt: 'y' }] },
      async () => 'ok',
      {
        agentFor: () => {
          throw new Error('no agent');
        },
        logger,
      },
    );

    const result = await controller.start();

    expect(result.status).toBe('failed');
    expect(result.steps.map((s) => s.error)).toEqual([
      { kind: 'WorkflowStopped', message: 'Not started: no agent' },
      { kind: 'WorkflowStopped', message: 'Not started: no agent' },
    ]);
    expect(logger.error).toHaveBeenCalledWith('Workflow scheduler failed', {
      run_id: 'wf_test',
      error: 'no agent',
    });
  });
});

describe('RunController.snapshot', () => {
  it('shows pending steps before the run and the result after', async () => {
    const { controller } = controllerFor({ steps: [{ id: 'a', prompt: 'x' }] }, async () => 'ok');

    const before = controller.snapshot();
    expect(before).toMatchObject({ run_id: 'wf_test', status: 'pending', result: null });
    expect(before.steps[0].status).toBe('pending');

    const result = await controller.start();
    const after = controller.snapshot();
    expect(after.status).toBe('completed');
    expect(after.result).toEqual(result);
  });
});
