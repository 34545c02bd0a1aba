// Workflow runtime
export * from './workflow-runtime/index.js';

// Agents
export { createCommandAgent, agentEnvironment } from './agents/index.js';
export type { AgentProcess, SpawnAgentProcess, CommandAgentOptions } from './agents/index.js';

// Config
export {
  RuntimeConfigSchema,
  DEFAULT_RUNTIME_CONFIG,
  readRuntimeConfig,
  validateRuntimeConfig,
  RuntimeConfigError,
  DEFAULT_CONFIG_PATH,
} from './config/index.js';
export type { RuntimeConfig, WorkflowsConfig, AgentConfig } from './config/index.js';

// Logging
export { createLogger, formatLogLine, silentLogger, LOG_LEVELS } from './logging/index.js';
export type { Logger, LoggerOptions, LogLevel, LogContext } from './logging/index.js';
