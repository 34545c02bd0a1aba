/**
 * Error types raised by the workflow runtime.
 *
 * Only load-time problems (RecipeError, RecipeNotFoundError) and lookups of
 * unknown runs reach callers as exceptions. Step-level failures are caught
 * by the step executor and recorded in StepResult.error.
 */

/**
 * A recipe failed validation at load time.
 */
export class RecipeError extends Error {
  override name = 'RecipeError' as const;

  constructor(
    message: string,
    /** Every problem found, one line each */
    public readonly issues: string[] = [message],
    /** First offending step, when one can be named */
    public readonly stepId?: string,
  ) {
    super(message);
  }
}

export class RecipeNotFoundError extends Error {
  override name = 'RecipeNotFoundError' as const;

  constructor(public readonly recipeName: string) {
    super(`Workflow recipe not found: ${recipeName}`);
  }
}

/**
 * An agent call failed: rejection, timeout, or a blank answer.
 */
export class StepExecutionError extends Error {
  override name: string = 'StepExecutionError';

  constructor(message: string, cause?: unknown) {
    super(message);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class StepTimeoutError extends StepExecutionError {
  override name = 'StepTimeoutError';

  constructor(public readonly timeoutMs: number) {
    super(`Agent did not answer within ${timeoutMs}ms`);
  }
}

export class UnknownRunError extends Error {
  override name = 'UnknownRunError' as const;

  constructor(public readonly runId: string) {
    super(`Unknown workflow run: ${runId}`);
  }
}

/**
 * Render any thrown value as a single-line message.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Thrown by submit() when the config switches workflows off.
 */
export class WorkflowsDisabledError extends Error {
  override name = 'WorkflowsDisabledError' as const;

  constructor() {
    super('Workflow runtime is disabled (workflows.enabled is false)');
  }
}
