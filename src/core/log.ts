/**
 * Leveled console logger. Everything goes to stderr so command output on
 * stdout stays machine-readable.
 */

import chalk from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVELS: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

let currentLevel: LogLevel = levelFromEnv(process.env.REQTRACE_LOG);

function levelFromEnv(value: string | undefined): LogLevel {
  return value && isLogLevel(value) ? value : 'warn';
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVELS[level] <= LEVELS[currentLevel];
}

/**
 * Create a logger whose lines are prefixed with `scope`.
 */
export function createLogger(scope: string): Logger {
  const prefix = chalk.gray(`[${scope}]`);
  return {
    error(message) {
      if (enabled('error')) console.error(`${prefix} ${chalk.red(message)}`);
    },
    warn(message) {
      if (enabled('warn')) console.error(`${prefix} ${chalk.yellow(message)}`);
    },
    info(message) {
      if (enabled('info')) console.error(`${prefix} ${message}`);
    },
    debug(message) {
      if (enabled('debug')) console.error(`${prefix} ${chalk.gray(message)}`);
    },
  };
}
