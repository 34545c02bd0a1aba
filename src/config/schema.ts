/**
 * Zod schema for the runtime configuration file.
 *
 * Every field has a `.default()` so that `RuntimeConfigSchema.parse({})`
 * returns a complete config. Users provide a partial file (or none) and
 * get the defaults for everything else.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger.js';

// ============================================================================
// Workflow runtime settings
// ============================================================================

const WorkflowsSchema = z.object({
  enabled: z.boolean().default(true),
  /** Directory holding recipe files (.yaml, .yml, .json) */
  path: z.string().min(1).default('workspace/workflows'),
  /** Directory for the JSONL event and run-result logs; null disables persistence */
  runs_dir: z.string().min(1).nullable().default('workspace/runs'),
  /** Terminal run results kept in memory for status lookups */
  max_retained_runs: z.number().int().min(1).max(10000).default(100),
  /** Bounded wait around each agent call; null = wait for the agent */
  step_timeout_ms: z.number().int().min(1).nullable().default(null),
  /** Unanswered approvals are denied after this long; null = wait forever */
  approval_timeout_ms: z.number().int().min(1).nullable().default(null),
  approval_session_key: z.string().min(1).default('dashboard:approvals'),
});

// ============================================================================
// Default agent
// ============================================================================

const AgentSchema = z.object({
  name: z.string().min(1).default('default'),
  /** Executable that receives the rendered prompt on stdin and answers on stdout */
  command: z.string().min(1).nullable().default(null),
  args: z.array(z.string()).default(() => []),
  model: z.string().min(1).nullable().default(null),
});

// ============================================================================
// Logging
// ============================================================================

const LoggingSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  color: z.boolean().default(true),
});

// ============================================================================
// Composite config
// ============================================================================

export const RuntimeConfigSchema = z.object({
  workflows: WorkflowsSchema.default({}),
  agent: AgentSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type WorkflowsConfig = RuntimeConfig['workflows'];
export type AgentConfig = RuntimeConfig['agent'];

/** Defaults produced by parsing an empty object. */
export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = RuntimeConfigSchema.parse({});
