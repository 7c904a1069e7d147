/**
 * @fileoverview Logging utility for @rowcast/cli package.
 *
 * Levelled logging to standard error. Standard output carries rendered
 * records, so no log line is ever written there.
 *
 * @module logger
 *
 * @example
 * ```typescript
 * import { logger, setLogLevel } from './logger.js';
 *
 * setLogLevel('debug');
 * logger.debug('Loaded records', { count: 2 });
 * logger.warn('Inferring columns from the first record');
 * ```
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const PREFIX = '[rowcast]';

let currentLevel: LogLevel = 'info';

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const labels: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: `${PREFIX} DEBUG:`,
  info: PREFIX,
  warn: `${PREFIX} WARN:`,
  error: `${PREFIX} ERROR:`,
};

/**
 * Set the global log level.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Get the current log level.
 */
export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Whether the environment asks for debug output (`DEBUG=1` or `DEBUG=true`).
 *
 * @param env - Environment variables, usually `process.env`
 */
export function isDebugEnv(env: NodeJS.ProcessEnv): boolean {
  return env.DEBUG === '1' || env.DEBUG === 'true';
}

function emit(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
  if (levels[level] < levels[currentLevel]) {
    return;
  }
  console.error(`${labels[level]} ${message}`, ...args);
}

/**
 * Logger object with methods for different log levels.
 */
export const logger = {
  debug: (message: string, ...args: unknown[]): void => emit('debug', message, args),
  info: (message: string, ...args: unknown[]): void => emit('info', message, args),
  warn: (message: string, ...args: unknown[]): void => emit('warn', message, args),
  error: (message: string, ...args: unknown[]): void => emit('error', message, args),
};
