/**
 * Base Command
 *
 * Shared by every CLI command:
 * - Global option handling (verbose, quiet, no-color, data dir)
 * - Mapping of domain errors to exit codes
 * - Output helpers for stdout, diagnostics on stderr
 *
 * A BaseCommand is also the Logger handed to the engine, so component
 * log lines follow the same verbosity flags as the command itself.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import {
  AnalysisValidationError,
  ChannelNotFoundError,
  AnalysisNotFoundError,
  InvalidIdentifierError,
  isProviderError,
  isQuotaExceededError,
  toErrorPayload,
} from '../errors/index.js';
import { createConsoleLogger, type Logger, type LogLevel } from '../logging/index.js';
import { getDataDir, resolveDataDir } from '../storage/paths.js';
import { formatElapsed } from './formatters/progress.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** commander turns --no-color into color: false */
  color?: boolean;
  dataDir?: string;
}

export type OutputFormat = 'text' | 'json';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  /** Invalid usage, arguments or channel reference */
  USAGE_ERROR: 2,
  /** Channel or analysis not found */
  NOT_FOUND: 3,
  /** Provider failure or exhausted quota */
  PROVIDER_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof InvalidIdentifierError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (error instanceof ChannelNotFoundError || error instanceof AnalysisNotFoundError) {
    return EXIT_CODES.NOT_FOUND;
  }
  if (
    isQuotaExceededError(error) ||
    isProviderError(error) ||
    error instanceof AnalysisValidationError
  ) {
    return EXIT_CODES.PROVIDER_ERROR;
  }
  return EXIT_CODES.ERROR;
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * @example
 * ```typescript
 * .action(async (channel: string, options: AnalyzeOptions, cmd: Command) => {
 *   const base = getBaseCommand(cmd.parent ?? cmd);
 *   await base.run(async () => {
 *     base.debug(`Resolving ${channel}`);
 *     ...
 *   }, options.format);
 * });
 * ```
 */
export class BaseCommand implements Logger {
  readonly options: GlobalOptions;
  readonly dataDir: string;
  /** chalk bound to this command's colour setting */
  readonly paint: chalk.Chalk;

  private readonly useColor: boolean;
  private readonly logger: Logger;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;
    this.dataDir = options.dataDir ? resolveDataDir(options.dataDir) : getDataDir();
    this.paint = new chalk.Instance({ level: this.useColor ? 1 : 0 });
    this.logger = createConsoleLogger({
      level: this.logLevel(),
      color: options.color !== false && process.stderr.isTTY === true,
    });
  }

  // ==========================================================================
  // Logger (stderr)
  // ==========================================================================

  debug(message: string, ...args: unknown[]): void {
    this.logger.debug(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.logger.info(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.logger.warn(message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.logger.error(message, ...args);
  }

  // ==========================================================================
  // Output (stdout)
  // ==========================================================================

  /**
   * Print command output; suppressed in quiet mode
   */
  print(message = ''): void {
    if (!this.options.quiet) {
      console.log(message);
    }
  }

  success(message: string): void {
    this.print(this.paint.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
  }

  /**
   * Print data as formatted JSON. Always printed, quiet or not.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /**
   * Run a command body. Failures are reported and mapped onto
   * `process.exitCode`, so pending work can finish before the process exits.
   */
  async run(action: () => Promise<void>, format: OutputFormat = 'text'): Promise<ExitCode> {
    try {
      await action();
      return EXIT_CODES.SUCCESS;
    } catch (error) {
      const code = exitCodeFor(error);
      process.exitCode = code;

      if (format === 'json') {
        this.json(toErrorPayload(error));
      }
      this.error(error instanceof Error ? error.message : String(error));
      if (isQuotaExceededError(error) && error.retryAfterMs > 0) {
        this.error(`Quota window resets in ${formatElapsed(error.retryAfterMs)}`);
      }
      if (code === EXIT_CODES.ERROR && error instanceof Error && error.stack) {
        this.debug(error.stack);
      }
      return code;
    }
  }

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }

  hasColor(): boolean {
    return this.useColor;
  }

  private logLevel(): LogLevel {
    if (this.options.verbose) {
      return 'debug';
    }
    return this.options.quiet ? 'error' : 'warn';
  }
}

/**
 * Get the BaseCommand the program's preAction hook stored.
 * Falls back to a default one (for commands run outside the program).
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const base = cmd.opts()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    return new BaseCommand({});
  }
  return base;
}
