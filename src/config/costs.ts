/**
 * Cost Configuration
 *
 * Quota units charged by the YouTube Data API and token pricing for
 * Gemini generation. Token costs are in USD.
 *
 * @module config/costs
 */

import { z } from 'zod';

/**
 * YouTube Data API v3 quota units per call.
 *
 * Every list call costs 1 unit regardless of how many parts or ids are
 * requested; search is the expensive one.
 */
export const QUOTA_COSTS = {
  /** channels.list (by id, forHandle or forUsername) */
  channels: 1,
  /** playlistItems.list (one page of up to 50 uploads) */
  playlistItems: 1,
  /** videos.list (up to 50 ids) */
  videos: 1,
  /** search.list */
  search: 100,
} as const;

export type QuotaOperation = keyof typeof QUOTA_COSTS;

/**
 * Token costs per generative model family (USD per million tokens).
 *
 * `cachedInputPerMillion` applies to prompt tokens served from
 * Gemini's context cache.
 */
export const TOKEN_COSTS = {
  gemini: {
    inputPerMillion: 0.3,
    cachedInputPerMillion: 0.075,
    outputPerMillion: 2.5,
  },
} as const;

export type TokenProvider = keyof typeof TOKEN_COSTS;

/**
 * Token usage reported by a generative call
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  /** Portion of inputTokens served from the context cache */
  cachedInputTokens: number;
}

export const tokenUsageSchema = z.object({
  inputTokens: z.number().int().nonnegative(),
  outputTokens: z.number().int().nonnegative(),
  cachedInputTokens: z.number().int().nonnegative(),
});

/**
 * Calculate cost for token usage.
 *
 * Cached input tokens are billed at the discounted rate and are not
 * charged again at the full input rate.
 */
export function calculateTokenCost(provider: TokenProvider, usage: TokenUsage): number {
  const costs = TOKEN_COSTS[provider];
  const cached = Math.min(usage.cachedInputTokens, usage.inputTokens);
  const uncached = usage.inputTokens - cached;

  const inputCost = (uncached / 1_000_000) * costs.inputPerMillion;
  const cachedCost = (cached / 1_000_000) * costs.cachedInputPerMillion;
  const outputCost = (usage.outputTokens / 1_000_000) * costs.outputPerMillion;
  return inputCost + cachedCost + outputCost;
}

/**
 * Quota units for a number of calls of one operation
 */
export function calculateQuotaUnits(operation: QuotaOperation, callCount = 1): number {
  return QUOTA_COSTS[operation] * callCount;
}

/**
 * Format cost for display (e.g., "$0.0450")
 */
export function formatCost(cost: number): string {
  if (cost < 0.01) {
    return `$${cost.toFixed(4)}`;
  }
  return `$${cost.toFixed(2)}`;
}
