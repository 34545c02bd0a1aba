export { createLogger, formatLogLine, silentLogger, LOG_LEVELS } from './logger.js';
export type { Logger, LoggerOptions, LogLevel, LogContext } from './logger.js';
