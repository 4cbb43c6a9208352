/**
 * Pushline Logger
 *
 * Leveled console logging for the delivery pipeline. The core only logs at
 * debug level, so nothing is printed unless PUSHLINE_LOG_LEVEL=debug.
 *
 * @module logger
 */

import chalk from 'chalk';

/**
 * Log levels for filtering output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Resolve a level name from the environment, falling back to `info`.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) {
    return normalized;
  }
  return 'info';
}

let currentLevel: LogLevel = parseLogLevel(process.env.PUSHLINE_LOG_LEVEL);

/**
 * Override the level read from PUSHLINE_LOG_LEVEL.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Check if a message at the given level should be logged
 */
export function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * HH:MM:SS portion of the current ISO timestamp
 */
function timestamp(): string {
  return new Date().toISOString().split('T')[1].slice(0, 8);
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Create a logger whose lines are prefixed with `scope`.
 *
 * @example
 * const log = createLogger('apns');
 * log.debug('Wrote 3 frames');
 * // [12:04:55] DEBUG apns: Wrote 3 frames
 */
export function createLogger(scope: string): Logger {
  const prefix = (level: string) => `[${timestamp()}] ${level} ${scope}: `;

  return {
    debug(message, ...args) {
      if (shouldLog('debug')) {
        console.log(chalk.gray(prefix('DEBUG') + message), ...args);
      }
    },

    info(message, ...args) {
      if (shouldLog('info')) {
        console.log(chalk.blue(prefix('INFO') + message), ...args);
      }
    },

    warn(message, ...args) {
      if (shouldLog('warn')) {
        console.warn(chalk.yellow(prefix('WARN') + message), ...args);
      }
    },

    error(message, ...args) {
      if (shouldLog('error')) {
        console.error(chalk.red(prefix('ERROR') + message), ...args);
      }
    },
  };
}

export const logger = createLogger('pushline');
