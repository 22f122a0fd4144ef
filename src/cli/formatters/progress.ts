/**
 * Progress Formatters
 *
 * Spinner for the one long-running step of the CLI (a fresh analysis),
 * plus elapsed-time formatting. Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Suppress all spinner output (quiet mode, JSON output) */
  silent?: boolean;
  /** Time source for the elapsed suffix (default: Date.now) */
  now?: () => number;
}

/**
 * Spinner on stderr, so stdout carries only command output.
 *
 * @example
 * ```typescript
 * const spinner = createSpinner('Analyzing channel...').start();
 *
 * try {
 *   await engine.resolve(channel);
 *   spinner.succeed('Analysis ready');
 * } catch (err) {
 *   spinner.fail('Analysis failed');
 * }
 * ```
 */
export class ProgressSpinner {
  private readonly spinner: Ora;
  private readonly now: () => number;
  private startTime = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.now = options.now ?? Date.now;
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      stream: process.stderr,
      isEnabled: process.stderr.isTTY === true,
      isSilent: options.silent === true,
      discardStdin: false,
    });
  }

  start(text?: string): this {
    this.startTime = this.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop with a success mark and the elapsed time
   */
  succeed(text?: string): this {
    const elapsed = this.now() - this.startTime;
    const suffix = elapsed > 0 ? chalk.dim(` (${formatElapsed(elapsed)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + suffix);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  warn(text?: string): this {
    this.spinner.warn(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

/**
 * Format a duration in milliseconds, e.g. `850ms`, `4.2s`, `3m 5s`,
 * `2h 15m`
 */
export function formatElapsed(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const totalMinutes = Math.floor(seconds / 60);
  if (totalMinutes < 60) {
    return `${totalMinutes}m ${Math.round(seconds % 60)}s`;
  }

  return `${Math.floor(totalMinutes / 60)}h ${totalMinutes % 60}m`;
}

export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
