/**
 * Dependency-graph scheduling with a bounded number of steps in flight.
 *
 * A step is ready once every dependency has succeeded. Ready steps launch
 * in declaration order until `max_parallel` are in flight; the scheduler
 * then waits for any one of them to settle and re-evaluates readiness.
 *
 * Steps that require approval wait on their gate outside that bound: only
 * steps past approval hold one of the `max_parallel` slots, so a pending
 * approval never holds back other ready steps. An approved step takes the
 * next free slot, in declaration order with the other ready steps.
 *
 * Failure handling:
 * - a failed or skipped step skips all of its transitive dependents
 * - a failed step with `on_failure: stop` halts new launches; in-flight
 *   steps finish and untouched steps end as WorkflowStopped
 * - after cancellation nothing new launches and untouched steps end
 *   cancelled, whether or not a stop failure happened first
 */

import { RecipeDAG } from './recipe-dag.js';
import type { RecipeStep } from './types.js';
import type { Scheduler } from './linear-scheduler.js';
import { renderTemplate } from './template-renderer.js';

interface Settled {
  stepId: string;
  /** Rendered prompt of a step whose approval wait cleared it to run */
  clearedPrompt: string | null;
}

export const runDag: Scheduler = async ({ state, executor, agentFor, signal, logger }) => {
  const { recipe } = state;
  const dag = RecipeDAG.fromSteps(recipe.steps);
  const context = { state, signal };
  // Steps holding a slot
  const inFlight = new Map<string, Promise<Settled>>();
  // Approval waits, which hold no slot
  const approving = new Map<string, Promise<Settled>>();
  // Approved steps waiting for a slot, with their rendered prompts
  const cleared = new Map<string, string>();
  let stoppedBy: string | null = null;

  const isReady = (step: RecipeStep): boolean =>
    state.statusOf(step.id) === 'pending' &&
    !inFlight.has(step.id) &&
    !approving.has(step.id) &&
    !cleared.has(step.id) &&
    [...dag.predecessors(step.id)].every((dep) => state.statusOf(dep) === 'succeeded');

  // Rendered when the step becomes ready, so every upstream output is recorded
  const render = (step: RecipeStep): string => renderTemplate(step.prompt, state.vars, state.outputs);

  const launch = (step: RecipeStep, prompt: string): void => {
    cleared.delete(step.id);
    const work = step.require_approval
      ? executor.execute(step, prompt, agentFor(step), context)
      : executor.runStep(step, prompt, agentFor(step), context);
    inFlight.set(
      step.id,
      work.then(() => ({ stepId: step.id, clearedPrompt: null })),
    );
  };

  const requestApproval = (step: RecipeStep, prompt: string): void => {
    approving.set(
      step.id,
      executor
        .approve(step, prompt, context)
        .then((blocked) => ({ stepId: step.id, clearedPrompt: blocked === null ? prompt : null })),
    );
  };

  const skipDependents = (stepId: string): void => {
    for (const dependent of dag.transitiveDependents(stepId)) {
      if (state.statusOf(dependent) !== 'pending') continue;
      state.transition(dependent, 'skipped', {
        error: {
          kind: 'DependencyFailed',
          message: `Skipped because dependency "${stepId}" did not succeed`,
        },
      });
    }
  };

  for (;;) {
    if (stoppedBy === null && !signal.aborted) {
      for (const step of recipe.steps) {
        const approvedPrompt = cleared.get(step.id);
        if (approvedPrompt !== undefined) {
          if (inFlight.size < recipe.max_parallel) launch(step, approvedPrompt);
        } else if (!isReady(step)) {
          continue;
        } else if (step.require_approval) {
          requestApproval(step, render(step));
        } else if (inFlight.size < recipe.max_parallel) {
          launch(step, render(step));
        }
      }
    }

    if (inFlight.size === 0 && approving.size === 0) break;

    const settled = await Promise.race([...inFlight.values(), ...approving.values()]);
    inFlight.delete(settled.stepId);
    approving.delete(settled.stepId);

    if (settled.clearedPrompt !== null) {
      cleared.set(settled.stepId, settled.clearedPrompt);
      continue;
    }

    const status = state.statusOf(settled.stepId);
    if (status === 'failed' || status === 'skipped') {
      skipDependents(settled.stepId);
    }

    const step = recipe.steps.find((s) => s.id === settled.stepId);
    if (status === 'failed' && step?.on_failure === 'stop' && stoppedBy === null) {
      logger.debug(`Step ${settled.stepId} failed; no further steps will launch`, { run_id: state.runId });
      stoppedBy = settled.stepId;
    }
  }

  // Steps that never launched, approved ones included
  for (const step of recipe.steps) {
    if (state.isStepTerminal(step.id)) continue;

    if (signal.aborted) {
      state.transition(step.id, 'cancelled', {
        error: { kind: 'Cancelled', message: 'Run was cancelled before the step started' },
      });
    } else if (stoppedBy !== null) {
      state.transition(step.id, 'skipped', {
        error: {
          kind: 'WorkflowStopped',
          message: `Not started because step "${stoppedBy}" failed and stops the workflow`,
        },
      });
    } else {
      state.transition(step.id, 'skipped', {
        error: { kind: 'DependencyFailed', message: 'Dependencies never completed' },
      });
    }
  }
};
