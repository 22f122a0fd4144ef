/**
 * Quota Display
 *
 * Plain-text formatting of a ledger summary for the CLI.
 *
 * @module quota/display
 */

import { formatCost } from '../config/costs.js';
import type { QuotaSummary } from './ledger.js';

const DIVIDER = '----------------------------------------';

/**
 * Format a quota summary for terminal display.
 *
 * @example
 * ```
 * === Quota ===
 * Window: 2024-06-01T00:00:00.000Z
 * Resets: 2024-06-02T00:00:00.000Z
 *
 * Operation       Units
 * ----------------------------------------
 * channels        3
 * playlistItems   12
 * ----------------------------------------
 * Used            15 / 10,000
 * Remaining       9,985
 *
 * Gemini: 2 generations, 12,000 in / 900 out tokens, $0.0059
 * ```
 */
export function formatQuotaSummary(summary: QuotaSummary): string {
  const lines: string[] = [];

  lines.push('=== Quota ===');
  lines.push(`Window: ${summary.windowStart}`);
  lines.push(`Resets: ${summary.resetsAt}`);
  lines.push('');

  lines.push(padColumn('Operation', 16) + 'Units');
  lines.push(DIVIDER);
  const operations = Object.entries(summary.byOperation);
  if (operations.length === 0) {
    lines.push('(no calls this window)');
  }
  for (const [operation, units] of operations) {
    lines.push(padColumn(operation, 16) + formatNumber(units ?? 0));
  }
  lines.push(DIVIDER);
  lines.push(
    padColumn('Used', 16) + `${formatNumber(summary.consumed)} / ${formatNumber(summary.budget)}`
  );
  lines.push(padColumn('Remaining', 16) + formatNumber(summary.remaining));
  lines.push('');
  lines.push(formatAiLine(summary.ai));

  return lines.join('\n');
}

function formatAiLine(ai: QuotaSummary['ai']): string {
  const budget = ai.budgetUsd === null ? '' : ` of ${formatCost(ai.budgetUsd)}`;
  const tokens = `${formatNumber(ai.inputTokens)} in / ${formatNumber(ai.outputTokens)} out tokens`;
  const cached =
    ai.cachedInputTokens > 0 ? ` (${formatNumber(ai.cachedInputTokens)} cached)` : '';
  const noun = ai.generations === 1 ? 'generation' : 'generations';
  return `Gemini: ${ai.generations} ${noun}, ${tokens}${cached}, ${formatCost(ai.costUsd)}${budget}`;
}

function padColumn(str: string, width: number): string {
  return str.padEnd(width);
}

function formatNumber(num: number): string {
  return num.toLocaleString('en-US');
}
