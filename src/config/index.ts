/**
 * Runtime config module: barrel exports.
 *
 * @module config
 */

export { RuntimeConfigSchema, DEFAULT_RUNTIME_CONFIG } from './schema.js';
export type { RuntimeConfig, WorkflowsConfig, AgentConfig } from './schema.js';

export {
  readRuntimeConfig,
  validateRuntimeConfig,
  RuntimeConfigError,
  DEFAULT_CONFIG_PATH,
} from './reader.js';
