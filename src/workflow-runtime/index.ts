/**
 * Workflow runtime module: recipes, schedulers, runs.
 *
 * @module workflow-runtime
 */

// Types and schemas
export * from './types.js';

// Errors
export {
  RecipeError,
  RecipeNotFoundError,
  StepExecutionError,
  StepTimeoutError,
  UnknownRunError,
  WorkflowsDisabledError,
  describeError,
} from './errors.js';

// Recipe model
export { RecipeDAG } from './recipe-dag.js';
export type { CycleDetectionResult } from './recipe-dag.js';
export { collectRecipeIssues, validateRecipe, findTemplateWarnings } from './recipe-validator.js';
export type { RecipeIssue } from './recipe-validator.js';
export {
  loadRecipe,
  parseRecipeText,
  parseRecipeFile,
  recipeFormatFor,
  defaultStepId,
  RECIPE_EXTENSIONS,
} from './recipe-parser.js';
export type { RecipeFormat } from './recipe-parser.js';
export { RecipeRepository } from './recipe-repository.js';
export type { RecipeEntry } from './recipe-repository.js';

// Rendering
export { renderTemplate, findPlaceholders, outputReference } from './template-renderer.js';
export type { TemplateVars } from './template-renderer.js';

// Execution
export { RunState } from './run-state.js';
export type { StepTransition } from './run-state.js';
export { StepExecutor, APPROVAL_PREVIEW_LENGTH } from './step-executor.js';
export type { StepExecutorOptions, StepRunContext } from './step-executor.js';
export { runLinear } from './linear-scheduler.js';
export type { Scheduler, SchedulerContext } from './linear-scheduler.js';
export { runDag } from './dag-scheduler.js';
export { RunController } from './run-controller.js';
export type { RunControllerOptions } from './run-controller.js';
export { WorkflowRuntime, newRunId } from './workflow-runtime.js';
export type { WorkflowRuntimeOptions, SubmitOptions, DefaultAgent } from './workflow-runtime.js';

// Approvals
export { ApprovalQueue, parseApprovalDecision, APPROVAL_WORDS } from './approval-queue.js';
export type { PendingApproval, ApprovalQueueOptions, ApprovalRequestHandler } from './approval-queue.js';

// Events and persistence
export { createEvent, fanOut, createLoggerSink } from './events.js';
export { RunStore, EVENTS_FILENAME, RUNS_FILENAME } from './run-store.js';
