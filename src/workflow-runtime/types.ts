/**
 * Type definitions for workflow recipes and their runs.
 *
 * Defines Zod schemas and TypeScript types for:
 * - RecipeStepInputSchema / RecipeFileSchema: the on-disk recipe format
 * - Recipe / RecipeStep: the validated, immutable in-memory recipe
 * - StepResult / RunResult: what a run reports back, step by step
 * - WorkflowEvent: lifecycle events handed to event sinks
 * - The collaborator callbacks the runtime consumes (agent, approval gate)
 *
 * Run records use snake_case keys because they are persisted as JSONL
 * and returned verbatim by the CLI.
 */

import { z } from 'zod';

// ============================================================================
// Enumerations
// ============================================================================

export const RECIPE_MODES = ['linear', 'dag'] as const;
export type RecipeMode = (typeof RECIPE_MODES)[number];

export const ON_FAILURE_POLICIES = ['stop', 'continue'] as const;
export type OnFailurePolicy = (typeof ON_FAILURE_POLICIES)[number];

export const StepStatusSchema = z.enum([
  'pending',
  'running',
  'succeeded',
  'failed',
  'skipped',
  'awaiting_approval',
  'cancelled',
]);
export type StepStatus = z.infer<typeof StepStatusSchema>;

export const RunStatusSchema = z.enum([
  'pending',
  'running',
  'cancelling',
  'completed',
  'failed',
  'cancelled',
]);
export type RunStatus = z.infer<typeof RunStatusSchema>;

export const TerminalRunStatusSchema = z.enum(['completed', 'failed', 'cancelled']);
export type TerminalRunStatus = z.infer<typeof TerminalRunStatusSchema>;

export const StepErrorKindSchema = z.enum([
  'StepExecutionError',
  'ApprovalDenied',
  'DependencyFailed',
  'PreviousStepStopped',
  'WorkflowStopped',
  'Cancelled',
  'EmptyPrompt',
]);
export type StepErrorKind = z.infer<typeof StepErrorKindSchema>;

const TERMINAL_STEP_STATUSES: ReadonlySet<StepStatus> = new Set<StepStatus>([
  'succeeded',
  'failed',
  'skipped',
  'cancelled',
]);

export function isTerminalStepStatus(status: StepStatus): boolean {
  return TERMINAL_STEP_STATUSES.has(status);
}

export function isTerminalRunStatus(status: RunStatus): status is TerminalRunStatus {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}

// ============================================================================
// Recipe file format
// ============================================================================

/** Ids and dependency entries may be written as YAML numbers (`id: 1`). */
const StepIdSchema = z
  .union([z.string(), z.number()])
  .transform(String)
  .pipe(z.string().trim().min(1, 'step id must not be empty'));

/**
 * Schema for one step as written in a recipe file (after alias folding).
 *
 * Required: prompt
 * Optional with defaults: id (derived from position), depends_on ([]),
 * retry_max_attempts (1), retry_backoff_ms (750), require_approval (false),
 * on_failure ('stop')
 */
export const RecipeStepInputSchema = z.object({
  id: StepIdSchema.optional(),
  prompt: z.string({ required_error: 'prompt is required' }).trim().min(1, 'prompt is required'),
  description: z.string().optional(),
  depends_on: z
    .union([
      z
        .union([z.string(), z.number()])
        .transform(String)
        .transform((dep) => (dep.trim() ? [dep.trim()] : [])),
      z.array(
        z
          .union([z.string(), z.number()])
          .transform(String)
          .pipe(z.string().trim().min(1, 'dependency id must not be empty')),
      ),
    ])
    .default(() => []),
  retry_max_attempts: z.number().int().min(1, 'retry_max_attempts must be at least 1').default(1),
  retry_backoff_ms: z.number().int().min(0, 'retry_backoff_ms must not be negative').default(750),
  require_approval: z.boolean().default(false),
  on_failure: z.enum(ON_FAILURE_POLICIES).default('stop'),
  agent: z.string().trim().min(1).optional(),
});

export type RecipeStepInput = z.infer<typeof RecipeStepInputSchema>;

/**
 * Schema for a complete recipe file.
 *
 * Required: steps (min 1)
 * Optional with defaults: name (file stem), mode (inferred), max_parallel (4),
 * metadata ({})
 */
export const RecipeFileSchema = z.object({
  name: z.string().trim().min(1).optional(),
  description: z.string().optional(),
  mode: z.enum(RECIPE_MODES).optional(),
  max_parallel: z.number().int().min(1, 'max_parallel must be at least 1').default(4),
  metadata: z.record(z.string(), z.unknown()).default(() => ({})),
  steps: z.array(RecipeStepInputSchema).min(1, 'recipe has no steps'),
});

export type RecipeFile = z.infer<typeof RecipeFileSchema>;

// ============================================================================
// Loaded recipe
// ============================================================================

export interface RecipeStep {
  readonly id: string;
  readonly prompt: string;
  readonly description?: string;
  readonly depends_on: readonly string[];
  readonly retry_max_attempts: number;
  readonly retry_backoff_ms: number;
  readonly require_approval: boolean;
  readonly on_failure: OnFailurePolicy;
  readonly agent?: string;
}

export interface Recipe {
  readonly name: string;
  readonly description?: string;
  readonly mode: RecipeMode;
  readonly max_parallel: number;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly steps: readonly RecipeStep[];
}

export interface RecipeValidationResult {
  valid: boolean;
  errors: string[];
  /** Topological order in declaration-stable form, null when invalid */
  executionOrder: string[] | null;
}

// ============================================================================
// Run records
// ============================================================================

export const StepErrorSchema = z.object({
  kind: StepErrorKindSchema,
  message: z.string(),
});
export type StepError = z.infer<typeof StepErrorSchema>;

export const StepResultSchema = z.object({
  step_id: z.string(),
  status: StepStatusSchema,
  output: z.string().nullable(),
  error: StepErrorSchema.nullable(),
  attempt_count: z.number().int().min(0),
  started_at: z.string().nullable(),
  finished_at: z.string().nullable(),
});
export type StepResult = z.infer<typeof StepResultSchema>;

export const RunResultSchema = z.object({
  run_id: z.string(),
  recipe_name: z.string(),
  mode: z.enum(RECIPE_MODES),
  status: TerminalRunStatusSchema,
  started_at: z.string(),
  finished_at: z.string(),
  duration_ms: z.number().min(0),
  steps: z.array(StepResultSchema),
});
export type RunResult = z.infer<typeof RunResultSchema>;

/** Point-in-time view of a run, terminal or not. */
export interface RunSnapshot {
  run_id: string;
  recipe_name: string;
  mode: RecipeMode;
  status: RunStatus;
  steps: StepResult[];
  result: RunResult | null;
}

// ============================================================================
// Events
// ============================================================================

export const WorkflowEventTypeSchema = z.enum([
  'run.started',
  'run.cancelling',
  'run.finished',
  'step.started',
  'step.retrying',
  'step.awaiting_approval',
  'step.approved',
  'step.succeeded',
  'step.failed',
  'step.skipped',
  'step.cancelled',
]);
export type WorkflowEventType = z.infer<typeof WorkflowEventTypeSchema>;

export const WorkflowEventSchema = z.object({
  run_id: z.string(),
  step_id: z.string().optional(),
  type: WorkflowEventTypeSchema,
  timestamp: z.string(),
  detail: z.record(z.string(), z.unknown()).default(() => ({})),
});
export type WorkflowEvent = z.infer<typeof WorkflowEventSchema>;

export type EventSink = (event: WorkflowEvent) => void;

// ============================================================================
// Collaborators
// ============================================================================

/** Who a step's prompt is sent to. */
export interface AgentHandle {
  name: string;
  /** Conversation key, `workflow:<recipe>:<step>` */
  session_key: string;
  model: string | null;
  channel: string;
  chat_id: string;
}

/** Submitter-provided routing hints. */
export interface CallerContext {
  channel?: string;
  chat_id?: string;
  agent?: string;
  model?: string;
}

/**
 * Step-execution callback: sends the rendered prompt to an agent and
 * resolves with its text answer. Rejections are step failures.
 */
export type StepCallback = (
  agent: AgentHandle,
  prompt: string,
  signal: AbortSignal,
) => Promise<string>;

export type ApprovalDecision = 'approved' | 'denied';

export interface ApprovalRequest {
  run_id: string;
  step_id: string;
  recipe_name: string;
  prompt_preview: string;
}

/**
 * Approval gate: resolves once a human approves or denies the step.
 * The signal aborts when the run is cancelled.
 */
export type ApprovalGate = (
  request: ApprovalRequest,
  signal: AbortSignal,
) => Promise<ApprovalDecision>;
