/**
 * Leveled console logger.
 *
 * Lines go to stderr so that stdout stays free for the CLI's JSON output.
 * Each line carries an ISO timestamp, the level, the message, and an
 * optional structured context rendered as JSON.
 *
 * @module logging/logger
 */

import pc from 'picocolors';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

export interface LoggerOptions {
  /** Minimum level written (default: 'info') */
  level?: LogLevel;
  /** Colour the level tag with picocolors (default: true when stderr is a TTY) */
  color?: boolean;
  /** Line sink, mainly for tests (default: console.error) */
  write?: (line: string) => void;
}

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
  debug: pc.gray,
  info: pc.cyan,
  warn: pc.yellow,
  error: pc.red,
};

/**
 * Format one log line. Exported for tests.
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  context: LogContext | undefined,
  color: boolean,
  now: Date = new Date(),
): string {
  const tag = level.toUpperCase().padEnd(5);
  const coloredTag = color ? LEVEL_COLOR[level](tag) : tag;
  const timestamp = color ? pc.dim(now.toISOString()) : now.toISOString();

  let line = `${timestamp} ${coloredTag} ${message}`;
  if (context && Object.keys(context).length > 0) {
    line += ` ${JSON.stringify(context)}`;
  }
  return line;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = options.level ?? 'info';
  const color = options.color ?? Boolean(process.stderr.isTTY);
  const write = options.write ?? ((line: string) => console.error(line));

  function log(level: LogLevel, message: string, context?: LogContext): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;
    write(formatLogLine(level, message, context, color));
  }

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
