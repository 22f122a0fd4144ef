/**
 * Logger
 *
 * Minimal logging contract passed to every I/O component, plus a chalk
 * console implementation and a silent one for tests and embedding.
 *
 * @module logging/logger
 */

import chalk from 'chalk';

// ============================================================================
// Types
// ============================================================================

/**
 * Minimal logger interface.
 * Components log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden in production) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface ConsoleLoggerOptions {
  /** Lowest level that is written (default: 'info') */
  level?: LogLevel;
  /** Colourise output (default: true when stderr is a TTY) */
  color?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

// ============================================================================
// Implementations
// ============================================================================

/**
 * Create a console logger writing to stderr so command output on stdout
 * stays machine-readable.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const paint = new chalk.Instance({
    level: (options.color ?? process.stderr.isTTY === true) ? 1 : 0,
  });

  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= threshold;

  return {
    debug(message, ...args) {
      if (enabled('debug')) console.error(paint.dim(`[DEBUG] ${message}`), ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.error(message, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.error(paint.yellow(`Warning: ${message}`), ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(paint.red(`Error: ${message}`), ...args);
    },
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Describe a thrown value for a log line
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
