/**
 * Quota Ledger
 *
 * Tracks metadata-provider quota units and generative spend within a fixed
 * accounting window. Windows are aligned to the epoch, so the default 24h
 * window resets at 00:00 UTC like the YouTube Data API daily quota.
 *
 * `reserve` checks and increments in one synchronous step. Under Node's
 * event loop no other caller can interleave, so concurrent computations
 * can never push consumption past the budget.
 *
 * @module quota/ledger
 */

import {
  QUOTA_COSTS,
  calculateTokenCost,
  type QuotaOperation,
  type TokenUsage,
} from '../config/costs.js';
import { QuotaExceededError } from '../errors/index.js';
import type { Logger } from '../logging/index.js';
import { SCHEMA_VERSIONS, type QuotaSnapshot } from '../schemas/index.js';

// ============================================================================
// Types
// ============================================================================

export interface QuotaLedgerOptions {
  /** Metadata-provider units allowed per window */
  dailyBudget: number;
  /** Accounting window length in milliseconds */
  windowMs: number;
  /** Generative spend ceiling per window (USD); null or absent = unlimited */
  aiDailyBudgetUsd?: number | null;
  /** Time source (default: system clock) */
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Outcome of a reservation. A failed reservation consumed nothing and the
 * caller must not make the external call.
 */
export type Reservation =
  | { ok: true; remaining: number }
  | { ok: false; error: QuotaExceededError };

export interface AiSpend {
  generations: number;
  inputTokens: number;
  outputTokens: number;
  cachedInputTokens: number;
  costUsd: number;
}

/**
 * Point-in-time view of the ledger for display
 */
export interface QuotaSummary {
  windowStart: string;
  resetsAt: string;
  budget: number;
  consumed: number;
  remaining: number;
  byOperation: Partial<Record<QuotaOperation, number>>;
  ai: AiSpend & { budgetUsd: number | null };
}

// ============================================================================
// QuotaLedger Class
// ============================================================================

/**
 * @example
 * ```typescript
 * const ledger = new QuotaLedger({ dailyBudget: 10_000, windowMs: 86_400_000 });
 *
 * const reservation = ledger.reserveCall('playlistItems');
 * if (!reservation.ok) throw reservation.error;
 * await client.listPlaylistItems(uploadsId);
 * ```
 */
export class QuotaLedger {
  private readonly dailyBudget: number;
  private readonly windowMs: number;
  private readonly aiBudgetUsd: number | null;
  private readonly clock: () => Date;
  private readonly logger?: Logger;

  private currentWindowStart: number;
  private units = 0;
  private byOperation: Partial<Record<QuotaOperation, number>> = {};
  private ai: AiSpend = emptyAiSpend();

  constructor(options: QuotaLedgerOptions) {
    if (!Number.isInteger(options.dailyBudget) || options.dailyBudget < 0) {
      throw new Error('Quota budget must be a non-negative integer');
    }
    if (!Number.isInteger(options.windowMs) || options.windowMs <= 0) {
      throw new Error('Quota window must be a positive number of milliseconds');
    }
    this.dailyBudget = options.dailyBudget;
    this.windowMs = options.windowMs;
    this.aiBudgetUsd = options.aiDailyBudgetUsd ?? null;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger;
    this.currentWindowStart = this.windowStartFor(this.clock().getTime());
  }

  // ==========================================================================
  // Metadata Provider Units
  // ==========================================================================

  /**
   * Reserve `units` against the window's budget.
   *
   * Succeeds only if consumption after the reservation stays within the
   * budget; otherwise nothing is consumed.
   */
  reserve(units: number, operation?: QuotaOperation): Reservation {
    if (!Number.isInteger(units) || units < 0) {
      throw new RangeError(`Quota reservation must be a non-negative integer, got ${units}`);
    }
    this.rollWindow();

    const remaining = this.dailyBudget - this.units;
    if (units > remaining) {
      this.logger?.warn(
        `[quota] Refused ${units} unit(s)${operation ? ` for ${operation}` : ''}: ${remaining} remaining of ${this.dailyBudget}`
      );
      return {
        ok: false,
        error: new QuotaExceededError(
          `YouTube quota exhausted: ${units} unit(s) requested, ${remaining} remaining`,
          'youtube',
          units,
          remaining,
          this.msUntilReset()
        ),
      };
    }

    this.units += units;
    if (operation) {
      this.byOperation[operation] = (this.byOperation[operation] ?? 0) + units;
    }
    this.logger?.debug(
      `[quota] Reserved ${units} unit(s)${operation ? ` for ${operation}` : ''}, ${this.dailyBudget - this.units} remaining`
    );
    return { ok: true, remaining: this.dailyBudget - this.units };
  }

  /**
   * Reserve the fixed cost of `count` calls of one provider operation
   */
  reserveCall(operation: QuotaOperation, count = 1): Reservation {
    return this.reserve(QUOTA_COSTS[operation] * count, operation);
  }

  consumed(): number {
    this.rollWindow();
    return this.units;
  }

  remaining(): number {
    this.rollWindow();
    return Math.max(0, this.dailyBudget - this.units);
  }

  // ==========================================================================
  // Generative Spend
  // ==========================================================================

  /**
   * Gate a generation call on the AI budget. Token cost is only known
   * afterwards, so this refuses once the window's spend has reached the
   * budget rather than predicting the next call's cost.
   */
  reserveGeneration(): Reservation {
    this.rollWindow();
    if (this.aiBudgetUsd === null) {
      return { ok: true, remaining: Number.POSITIVE_INFINITY };
    }

    const remaining = this.aiBudgetUsd - this.ai.costUsd;
    if (remaining <= 0) {
      this.logger?.warn(
        `[quota] Refused generation: AI spend $${this.ai.costUsd.toFixed(4)} reached budget $${this.aiBudgetUsd.toFixed(2)}`
      );
      return {
        ok: false,
        error: new QuotaExceededError(
          `AI budget exhausted: $${this.ai.costUsd.toFixed(4)} of $${this.aiBudgetUsd.toFixed(2)} spent`,
          'gemini',
          1,
          0,
          this.msUntilReset()
        ),
      };
    }
    return { ok: true, remaining };
  }

  /**
   * Record token usage from a completed generation.
   *
   * @returns Cost of this usage in USD
   */
  recordAiUsage(usage: TokenUsage): number {
    this.rollWindow();
    const cost = calculateTokenCost('gemini', usage);
    this.ai = {
      generations: this.ai.generations + 1,
      inputTokens: this.ai.inputTokens + usage.inputTokens,
      outputTokens: this.ai.outputTokens + usage.outputTokens,
      cachedInputTokens: this.ai.cachedInputTokens + usage.cachedInputTokens,
      costUsd: this.ai.costUsd + cost,
    };
    this.logger?.debug(
      `[quota] Generation used ${usage.inputTokens} in / ${usage.outputTokens} out tokens ($${cost.toFixed(6)})`
    );
    return cost;
  }

  aiSpend(): AiSpend {
    this.rollWindow();
    return { ...this.ai };
  }

  // ==========================================================================
  // Window
  // ==========================================================================

  resetsAt(): Date {
    this.rollWindow();
    return new Date(this.currentWindowStart + this.windowMs);
  }

  msUntilReset(): number {
    return Math.max(0, this.currentWindowStart + this.windowMs - this.clock().getTime());
  }

  getSummary(): QuotaSummary {
    this.rollWindow();
    return {
      windowStart: new Date(this.currentWindowStart).toISOString(),
      resetsAt: new Date(this.currentWindowStart + this.windowMs).toISOString(),
      budget: this.dailyBudget,
      consumed: this.units,
      remaining: Math.max(0, this.dailyBudget - this.units),
      byOperation: { ...this.byOperation },
      ai: { ...this.ai, budgetUsd: this.aiBudgetUsd },
    };
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  snapshot(): QuotaSnapshot {
    this.rollWindow();
    return {
      schemaVersion: SCHEMA_VERSIONS.quota,
      windowStart: new Date(this.currentWindowStart).toISOString(),
      windowMs: this.windowMs,
      unitsConsumed: this.units,
      byOperation: { ...this.byOperation },
      ai: { ...this.ai },
    };
  }

  /**
   * Adopt a snapshot's consumption if it belongs to the current window.
   *
   * @returns false when the snapshot is from another window or window length
   */
  restore(snapshot: QuotaSnapshot): boolean {
    this.rollWindow();
    const snapshotStart = Date.parse(snapshot.windowStart);
    if (snapshot.windowMs !== this.windowMs || snapshotStart !== this.currentWindowStart) {
      this.logger?.debug(`[quota] Ignoring snapshot from window ${snapshot.windowStart}`);
      return false;
    }

    this.units = snapshot.unitsConsumed;
    this.byOperation = {};
    for (const [operation, units] of Object.entries(snapshot.byOperation)) {
      if (isQuotaOperation(operation)) {
        this.byOperation[operation] = units;
      }
    }
    this.ai = { ...snapshot.ai };
    return true;
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private windowStartFor(timeMs: number): number {
    return Math.floor(timeMs / this.windowMs) * this.windowMs;
  }

  private rollWindow(): void {
    const start = this.windowStartFor(this.clock().getTime());
    if (start !== this.currentWindowStart) {
      if (this.units > 0 || this.ai.generations > 0) {
        this.logger?.info(
          `[quota] New accounting window ${new Date(start).toISOString()}, resetting counters`
        );
      }
      this.currentWindowStart = start;
      this.units = 0;
      this.byOperation = {};
      this.ai = emptyAiSpend();
    }
  }
}

function emptyAiSpend(): AiSpend {
  return { generations: 0, inputTokens: 0, outputTokens: 0, cachedInputTokens: 0, costUsd: 0 };
}

function isQuotaOperation(value: string): value is QuotaOperation {
  return Object.prototype.hasOwnProperty.call(QUOTA_COSTS, value);
}
