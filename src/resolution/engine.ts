/**
 * Resolution Engine
 *
 * Public entry point. For a channel reference it tries the fast cache,
 * then the persistent store, then a single-flight fresh computation:
 *
 * 1. fresh cache hit       -> `cached`
 * 2. fresh store hit       -> `stored`, written back to the cache
 * 3. stale hit (any tier)  -> `stale`, refresh started in the background
 * 4. nothing usable        -> compute, persist, `new`
 *
 * A fresh hit in a later tier beats a stale hit in an earlier one.
 * Persistence failures are logged and never fail the caller that
 * triggered the computation.
 *
 * @module resolution/engine
 */

import {
  AnalysisNotFoundError,
  InvalidIdentifierError,
  PersistenceError,
} from '../errors/index.js';
import { describeError, type Logger } from '../logging/index.js';
import type { MetadataFetcher } from '../metadata/index.js';
import {
  ChannelIdSchema,
  ChannelRecordSchema,
  type AnalysisRecord,
  type ChannelRecord,
} from '../schemas/index.js';
import {
  cacheKey,
  referenceCacheKey,
  type FastCache,
  type PersistentStore,
} from '../storage/index.js';
import {
  formatChannelReference,
  parseChannelReference,
  type ChannelReference,
} from '../youtube/index.js';
import type { ComputedAnalysis } from './computation.js';
import {
  CacheResolver,
  StoreResolver,
  type TierName,
  type TierResolver,
} from './resolvers.js';
import type { ResolvedAnalysis } from './result.js';
import { SingleFlightCoordinator } from './single-flight.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Anything that can produce a fresh, unpersisted analysis
 */
export interface Computation {
  compute(channelId: string): Promise<ComputedAnalysis>;
}

export interface CacheTtls {
  analysis: number;
  channelMeta: number;
  videoList: number;
  urlMapping: number;
}

export interface ResolutionEngineOptions {
  cache: FastCache;
  store: PersistentStore;
  /** Resolves handles, usernames and custom names to channel ids */
  fetcher: Pick<MetadataFetcher, 'resolveChannelId'>;
  computation: Computation;
  cacheTtlSeconds: CacheTtls;
  /** Simultaneous fresh computations (default: 4) */
  maxConcurrentAnalyses?: number;
  clock?: () => Date;
  logger?: Logger;
}

const FRESHNESS_BY_TIER: Record<TierName, 'cached' | 'stored'> = {
  cache: 'cached',
  store: 'stored',
};

// ============================================================================
// ResolutionEngine Class
// ============================================================================

/**
 * @example
 * ```typescript
 * const { engine } = createResolutionEngine({ settings: config.settings, dataDir });
 *
 * const resolved = await engine.resolve('https://www.youtube.com/@somecreator');
 * console.log(toAnalysisResult(resolved, new Date()));
 * await engine.whenIdle();
 * ```
 */
export class ResolutionEngine {
  private readonly cache: FastCache;
  private readonly store: PersistentStore;
  private readonly fetcher: Pick<MetadataFetcher, 'resolveChannelId'>;
  private readonly computation: Computation;
  private readonly ttl: CacheTtls;
  private readonly clock: () => Date;
  private readonly logger?: Logger;
  private readonly tiers: TierResolver[];
  private readonly storeTier: StoreResolver;
  private readonly coordinator: SingleFlightCoordinator<ResolvedAnalysis>;
  private readonly background: Set<Promise<void>> = new Set();

  constructor(options: ResolutionEngineOptions) {
    this.cache = options.cache;
    this.store = options.store;
    this.fetcher = options.fetcher;
    this.computation = options.computation;
    this.ttl = options.cacheTtlSeconds;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger;
    this.storeTier = new StoreResolver(options.store, options.logger);
    this.tiers = [new CacheResolver(options.cache, options.logger), this.storeTier];
    this.coordinator = new SingleFlightCoordinator({
      compute: (channelId) => this.computeAndPersist(channelId),
      maxConcurrent: options.maxConcurrentAnalyses,
      logger: options.logger,
    });
  }

  // ==========================================================================
  // Public Operations
  // ==========================================================================

  /**
   * Return the best available analysis, computing one if none exists.
   *
   * @throws InvalidIdentifierError when the reference cannot be parsed
   * @throws ChannelNotFoundError, QuotaExceededError, ProviderError or
   *   AnalysisValidationError when a needed computation fails
   */
  async resolve(reference: string): Promise<ResolvedAnalysis> {
    const channelId = await this.resolveChannelId(reference);
    const now = this.clock();

    let stale: AnalysisRecord | null = null;
    for (const tier of this.tiers) {
      const lookup = await tier.lookup(channelId, now);
      if (lookup.status === 'hit-fresh') {
        if (tier.tier === 'store') {
          await this.writeCache(cacheKey('channel_analysis', channelId), lookup.record, this.ttl.analysis);
        }
        this.logger?.debug(`[resolve] ${channelId}: fresh ${tier.tier} hit`);
        return {
          record: lookup.record,
          channel: await this.knownChannel(channelId),
          freshness: FRESHNESS_BY_TIER[tier.tier],
        };
      }
      if (lookup.status === 'hit-stale' && !stale) {
        stale = lookup.record;
      }
    }

    if (stale) {
      this.logger?.info(`[resolve] ${channelId}: serving stale analysis, refreshing in background`);
      this.refreshInBackground(channelId);
      return { record: stale, channel: await this.knownChannel(channelId), freshness: 'stale' };
    }

    this.logger?.info(`[resolve] ${channelId}: no analysis available, computing`);
    return this.coordinator.run(channelId);
  }

  /**
   * Return whatever analysis exists, fresh or stale, without computing.
   * Costs nothing: references are mapped only through mappings recorded
   * by earlier resolutions.
   *
   * @throws AnalysisNotFoundError when neither tier has one, or the
   *   reference has never been resolved
   */
  async getExisting(reference: string): Promise<ResolvedAnalysis> {
    const channelId = await this.knownChannelId(reference);
    const now = this.clock();

    for (const tier of this.tiers) {
      const lookup = await tier.lookup(channelId, now);
      if (lookup.status !== 'miss') {
        return {
          record: lookup.record,
          channel: await this.knownChannel(channelId),
          freshness: lookup.status === 'hit-stale' ? 'stale' : FRESHNESS_BY_TIER[tier.tier],
        };
      }
    }
    throw new AnalysisNotFoundError(channelId);
  }

  /**
   * Drop the channel's analysis and metadata from the fast cache. The
   * store keeps its records.
   *
   * @returns The channel id that was invalidated
   */
  async invalidate(reference: string): Promise<string> {
    const channelId = await this.resolveChannelId(reference);
    await this.cache.delete(cacheKey('channel_analysis', channelId));
    await this.cache.delete(cacheKey('channel_meta', channelId));
    this.logger?.info(`[resolve] Invalidated cache for ${channelId}`);
    return channelId;
  }

  /**
   * Resolves once every background refresh started so far has settled
   */
  async whenIdle(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.allSettled([...this.background]);
    }
  }

  isComputing(channelId: string): boolean {
    return this.coordinator.isInFlight(channelId);
  }

  // ==========================================================================
  // Reference Resolution
  // ==========================================================================

  /**
   * Parse a reference and map it to a channel id. Raw ids need no lookup;
   * other forms go through the URL-mapping cache, the store's recorded
   * mappings, then the provider.
   */
  async resolveChannelId(reference: string): Promise<string> {
    const parsed = this.parse(reference);
    if (parsed.kind === 'id') {
      return parsed.value;
    }

    const normalised = formatChannelReference(parsed);
    const known = await this.lookupMapping(normalised);
    if (known) {
      return known;
    }

    const channelId = await this.fetcher.resolveChannelId(parsed);
    await this.writeCache(referenceCacheKey(normalised), channelId, this.ttl.urlMapping);
    await this.attempt(`save reference ${normalised}`, () =>
      this.store.saveReferenceMapping({
        reference: normalised,
        channelId,
        resolvedAt: this.clock().toISOString(),
      })
    );
    return channelId;
  }

  /**
   * Map a reference without calling the provider
   *
   * @throws AnalysisNotFoundError when the reference was never resolved
   */
  private async knownChannelId(reference: string): Promise<string> {
    const parsed = this.parse(reference);
    if (parsed.kind === 'id') {
      return parsed.value;
    }
    const normalised = formatChannelReference(parsed);
    const known = await this.lookupMapping(normalised);
    if (!known) {
      throw new AnalysisNotFoundError(reference.trim());
    }
    return known;
  }

  private parse(reference: string): ChannelReference {
    const parsed = parseChannelReference(reference);
    if (!parsed) {
      throw new InvalidIdentifierError(reference);
    }
    return parsed;
  }

  /**
   * Cached mapping, else the stored one (written back to the cache)
   */
  private async lookupMapping(normalised: string): Promise<string | null> {
    const key = referenceCacheKey(normalised);
    const cached = ChannelIdSchema.safeParse(await this.readCache(key));
    if (cached.success) {
      return cached.data;
    }

    let stored: string | null;
    try {
      stored = await this.store.getReferenceMapping(normalised);
    } catch (error) {
      this.logger?.warn(
        `[resolve] Store read failed for reference ${normalised}: ${describeError(error)}`
      );
      return null;
    }
    if (stored) {
      await this.writeCache(key, stored, this.ttl.urlMapping);
    }
    return stored;
  }

  // ==========================================================================
  // Computation and Persistence
  // ==========================================================================

  private refreshInBackground(channelId: string): void {
    if (this.coordinator.isInFlight(channelId)) {
      return;
    }
    const task: Promise<void> = this.coordinator
      .run(channelId)
      .then(
        (refreshed) => {
          this.logger?.info(
            `[resolve] Background refresh for ${channelId} finished${refreshed.record.degraded ? ' (degraded, not stored)' : ''}`
          );
        },
        (error: unknown) => {
          this.logger?.warn(`[resolve] Background refresh for ${channelId} failed: ${describeError(error)}`);
        }
      )
      .finally(() => {
        this.background.delete(task);
      });
    this.background.add(task);
  }

  /**
   * Runs inside the single flight, so each computation is persisted once
   * no matter how many callers wait for it.
   *
   * A caller can find the store empty, then start its flight only after an
   * earlier flight for the same channel has persisted and settled. The
   * store is read again here so that caller gets the stored record instead
   * of paying for a second computation.
   */
  private async computeAndPersist(channelId: string): Promise<ResolvedAnalysis> {
    const existing = await this.storeTier.lookup(channelId, this.clock());
    if (existing.status === 'hit-fresh') {
      this.logger?.debug(`[resolve] ${channelId}: analysis stored meanwhile, not recomputing`);
      await this.writeCache(cacheKey('channel_analysis', channelId), existing.record, this.ttl.analysis);
      return {
        record: existing.record,
        channel: await this.knownChannel(channelId),
        freshness: 'stored',
      };
    }

    const computed = await this.computation.compute(channelId);
    await this.persist(computed);
    return { record: computed.record, channel: computed.channel, freshness: 'new' };
  }

  /**
   * Store first, then cache. Degraded analyses are returned but never
   * stored or cached, so they cannot replace a real analysis.
   */
  private async persist(computed: ComputedAnalysis): Promise<void> {
    const { record, channel, videos } = computed;
    const channelId = channel.channelId;

    await this.attempt(`save channel ${channelId}`, () => this.store.saveChannel(channel));
    await this.attempt(`save videos for ${channelId}`, () =>
      this.store.upsertVideos(channelId, videos)
    );
    if (!record.degraded) {
      await this.attempt(`save analysis for ${channelId}`, () => this.store.saveAnalysis(record));
    }

    await this.writeCache(cacheKey('channel_meta', channelId), channel, this.ttl.channelMeta);
    await this.writeCache(
      cacheKey('video_list', channel.uploadsPlaylistId),
      videos,
      this.ttl.videoList
    );
    if (!record.degraded) {
      await this.writeCache(cacheKey('channel_analysis', channelId), record, this.ttl.analysis);
    }
  }

  private async attempt(operation: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      const failure =
        error instanceof PersistenceError ? error : new PersistenceError(operation, { cause: error });
      this.logger?.error(`[resolve] ${failure.message}`);
    }
  }

  // ==========================================================================
  // Cache Helpers
  // ==========================================================================

  /**
   * Channel metadata from the cache or the store, for display only
   */
  private async knownChannel(channelId: string): Promise<ChannelRecord | null> {
    const cached = ChannelRecordSchema.safeParse(
      await this.readCache(cacheKey('channel_meta', channelId))
    );
    if (cached.success) {
      return cached.data;
    }
    try {
      return await this.store.getChannel(channelId);
    } catch (error) {
      this.logger?.warn(`[resolve] Store read failed for channel ${channelId}: ${describeError(error)}`);
      return null;
    }
  }

  private async readCache(key: string): Promise<unknown> {
    try {
      return await this.cache.get(key);
    } catch (error) {
      this.logger?.warn(`[resolve] Cache read failed for ${key}: ${describeError(error)}`);
      return undefined;
    }
  }

  private async writeCache(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    try {
      await this.cache.set(key, value, ttlSeconds);
    } catch (error) {
      this.logger?.warn(`[resolve] Cache write failed for ${key}: ${describeError(error)}`);
    }
  }
}

