/**
 * Tier Resolvers
 *
 * Each storage tier answers a lookup with one of three outcomes: a fresh
 * hit, a stale hit or a miss. The engine walks them in order; the policy
 * is testable without any provider behind it.
 *
 * @module resolution/resolvers
 */

import { describeError, type Logger } from '../logging/index.js';
import { AnalysisRecordSchema, type AnalysisRecord } from '../schemas/index.js';
import { classify } from '../staleness/index.js';
import { cacheKey, type FastCache, type PersistentStore } from '../storage/index.js';

export type TierName = 'cache' | 'store';

export type TierLookup =
  | { status: 'hit-fresh'; record: AnalysisRecord }
  | { status: 'hit-stale'; record: AnalysisRecord }
  | { status: 'miss' };

export interface TierResolver {
  readonly tier: TierName;
  /** Never throws: a failing tier is a miss */
  lookup(channelId: string, now: Date): Promise<TierLookup>;
}

function toLookup(record: AnalysisRecord | null, now: Date): TierLookup {
  switch (classify(record, now)) {
    case 'MISSING':
      return { status: 'miss' };
    case 'STALE':
      return record ? { status: 'hit-stale', record } : { status: 'miss' };
    case 'FRESH':
      return record ? { status: 'hit-fresh', record } : { status: 'miss' };
  }
}

// ============================================================================
// Fast Cache
// ============================================================================

export class CacheResolver implements TierResolver {
  readonly tier = 'cache';

  constructor(
    private readonly cache: FastCache,
    private readonly logger?: Logger
  ) {}

  async lookup(channelId: string, now: Date): Promise<TierLookup> {
    const key = cacheKey('channel_analysis', channelId);
    let value: unknown;
    try {
      value = await this.cache.get(key);
    } catch (error) {
      this.logger?.warn(`[resolve] Cache read failed for ${key}: ${describeError(error)}`);
      return { status: 'miss' };
    }
    if (value === undefined) {
      return { status: 'miss' };
    }

    const parsed = AnalysisRecordSchema.safeParse(value);
    if (!parsed.success) {
      this.logger?.debug(`[resolve] Ignoring malformed cache entry ${key}`);
      return { status: 'miss' };
    }
    return toLookup(parsed.data, now);
  }
}

// ============================================================================
// Persistent Store
// ============================================================================

export class StoreResolver implements TierResolver {
  readonly tier = 'store';

  constructor(
    private readonly store: PersistentStore,
    private readonly logger?: Logger
  ) {}

  async lookup(channelId: string, now: Date): Promise<TierLookup> {
    try {
      return toLookup(await this.store.getAnalysis(channelId), now);
    } catch (error) {
      this.logger?.warn(`[resolve] Store read failed for ${channelId}: ${describeError(error)}`);
      return { status: 'miss' };
    }
  }
}
