/**
 * Declaration-order scheduling.
 *
 * Steps run one at a time in the order the recipe lists them. A failed
 * step with `on_failure: stop` skips everything after it; `continue` moves
 * on and later prompts see its `{<id>_output}` placeholder unresolved.
 */

import type { Logger } from '../logging/logger.js';
import type { AgentHandle, RecipeStep } from './types.js';
import type { RunState } from './run-state.js';
import type { StepExecutor } from './step-executor.js';
import { renderTemplate } from './template-renderer.js';

/** Everything a scheduler needs to drive one run. */
export interface SchedulerContext {
  state: RunState;
  executor: StepExecutor;
  agentFor: (step: RecipeStep) => AgentHandle;
  /** Aborts when the run is cancelled */
  signal: AbortSignal;
  logger: Logger;
}

/**
 * A scheduler leaves every step of the run in a terminal status. It does
 * not decide the run's own status.
 */
export type Scheduler = (context: SchedulerContext) => Promise<void>;

export const runLinear: Scheduler = async ({ state, executor, agentFor, signal, logger }) => {
  let stoppedBy: string | null = null;

  for (const step of state.recipe.steps) {
    if (stoppedBy !== null) {
      state.transition(step.id, 'skipped', {
        error: {
          kind: 'PreviousStepStopped',
          message: `Skipped because step "${stoppedBy}" failed and stops the workflow`,
        },
      });
      continue;
    }

    const prompt = renderTemplate(step.prompt, state.vars, state.outputs);
    const result = await executor.runStep(step, prompt, agentFor(step), { state, signal });

    if (result.status === 'failed' && step.on_failure === 'stop') {
      logger.debug(`Step ${step.id} failed; stopping linear run`, { run_id: state.runId });
      stoppedBy = step.id;
    }
  }
};
