/**
 * Engine Factory
 *
 * Wires a ResolutionEngine from settings. Every collaborator can be
 * injected; the defaults are the file store, an in-memory cache, the
 * YouTube Data API client and Gemini. Provider clients are created on
 * first use, so commands that never reach a provider need no API keys.
 *
 * @module resolution/factory
 */

import {
  AnalysisGenerator,
  GeminiProvider,
  type GenerativeProvider,
} from '../analysis/index.js';
import type { ResolverSettings } from '../config/settings.js';
import type { Logger } from '../logging/index.js';
import { MetadataFetcher } from '../metadata/index.js';
import { QuotaLedger } from '../quota/index.js';
import {
  FileStore,
  MemoryCache,
  MemoryStore,
  type FastCache,
  type PersistentStore,
} from '../storage/index.js';
import { YouTubeClient, type YouTubeApi } from '../youtube/index.js';
import { AnalysisComputation } from './computation.js';
import { ResolutionEngine } from './engine.js';

export interface EngineDependencies {
  settings: ResolverSettings;
  /** Root of the file store; ignored when `store` is given */
  dataDir?: string;
  store?: PersistentStore;
  cache?: FastCache;
  youtube?: YouTubeApi;
  provider?: GenerativeProvider;
  ledger?: QuotaLedger;
  clock?: () => Date;
  /** Backoff wait used by retries (tests pass a no-op) */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface EngineBundle {
  engine: ResolutionEngine;
  ledger: QuotaLedger;
  store: PersistentStore;
  cache: FastCache;
}

/**
 * @example
 * ```typescript
 * const { engine, ledger } = createResolutionEngine({
 *   settings: config.settings,
 *   dataDir: config.dataDir,
 *   logger: createConsoleLogger(),
 * });
 * ```
 */
export function createResolutionEngine(deps: EngineDependencies): EngineBundle {
  const { settings, clock, sleep, logger } = deps;

  const ledger =
    deps.ledger ??
    new QuotaLedger({
      dailyBudget: settings.quota.dailyBudget,
      windowMs: settings.quota.windowMs,
      aiDailyBudgetUsd: settings.quota.aiDailyBudgetUsd,
      clock,
      logger,
    });
  const store =
    deps.store ??
    (deps.dataDir ? new FileStore({ dataDir: deps.dataDir, clock, logger }) : new MemoryStore({ clock }));
  const cache = deps.cache ?? new MemoryCache({ clock });

  const youtube =
    deps.youtube ?? lazyYouTube(() => new YouTubeClient({ timeoutMs: settings.metadata.timeoutMs }));
  const provider =
    deps.provider ??
    lazyProvider(settings.generation.modelId, () =>
      new GeminiProvider({
        model: { modelId: settings.generation.modelId },
        timeoutMs: settings.generation.timeoutMs,
        contextCaching: settings.generation.enableContextCaching,
      })
    );

  const fetcher = new MetadataFetcher({
    client: youtube,
    ledger,
    maxPages: settings.metadata.maxPages,
    sleep,
    clock,
    logger,
  });
  const generator = new AnalysisGenerator({
    provider,
    ledger,
    maxAttempts: settings.generation.maxAttempts,
    sleep,
    logger,
  });
  const computation = new AnalysisComputation({
    fetcher,
    generator,
    ledger,
    cache,
    maxSampleSize: settings.maxSampleSize,
    stalenessWindowMs: settings.stalenessWindowMs,
    degradedMode: settings.degradedMode,
    clock,
    logger,
  });

  const engine = new ResolutionEngine({
    cache,
    store,
    fetcher,
    computation,
    cacheTtlSeconds: settings.cacheTtlSeconds,
    maxConcurrentAnalyses: settings.maxConcurrentAnalyses,
    clock,
    logger,
  });

  return { engine, ledger, store, cache };
}

// ============================================================================
// Lazy Provider Clients
// ============================================================================

function lazyYouTube(create: () => YouTubeApi): YouTubeApi {
  let client: YouTubeApi | null = null;
  const get = (): YouTubeApi => {
    if (!client) {
      client = create();
    }
    return client;
  };
  return {
    getChannel: (channelId) => get().getChannel(channelId),
    getChannelByHandle: (handle) => get().getChannelByHandle(handle),
    getChannelByUsername: (username) => get().getChannelByUsername(username),
    searchChannelId: (query) => get().searchChannelId(query),
    listPlaylistItems: (playlistId, pageToken) => get().listPlaylistItems(playlistId, pageToken),
    getVideoDetails: (videoIds) => get().getVideoDetails(videoIds),
  };
}

function lazyProvider(modelId: string, create: () => GenerativeProvider): GenerativeProvider {
  let provider: GenerativeProvider | null = null;
  return {
    modelId,
    generate: (request) => {
      if (!provider) {
        provider = create();
      }
      return provider.generate(request);
    },
  };
}
