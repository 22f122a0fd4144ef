/**
 * channelscope
 *
 * Resolution and orchestration of YouTube channel analyses: fast cache,
 * persistent store, and single-flight fresh computation over the YouTube
 * Data API and Gemini.
 *
 * @example
 * ```typescript
 * import { createResolutionEngine, parseSettings, toAnalysisResult } from 'channelscope';
 *
 * const { engine } = createResolutionEngine({
 *   settings: parseSettings(process.env),
 *   dataDir: './data',
 * });
 * const resolved = await engine.resolve('https://www.youtube.com/@somecreator');
 * console.log(toAnalysisResult(resolved, new Date()));
 * ```
 *
 * @module channelscope
 */

export {
  ResolutionEngine,
  createResolutionEngine,
  toAnalysisResult,
  AnalysisComputation,
  SingleFlightCoordinator,
  type ResolvedAnalysis,
  type EngineDependencies,
  type EngineBundle,
  type Computation,
  type ComputedAnalysis,
} from './resolution/index.js';

export { parseSettings, type ResolverSettings } from './config/settings.js';
export { QUOTA_COSTS, TOKEN_COSTS, calculateTokenCost, type TokenUsage } from './config/costs.js';

export {
  AnalysisGenerator,
  GeminiProvider,
  buildAnalysisPrompt,
  buildDegradedAnalysis,
  type GenerativeProvider,
  type GenerationRequest,
  type GenerationResult,
} from './analysis/index.js';

export { MetadataFetcher } from './metadata/index.js';
export { QuotaLedger, type QuotaSummary, type Reservation } from './quota/index.js';
export { sampleVideos } from './sampling/index.js';
export { classify, ageLabel, computeExpiresAt, type Staleness } from './staleness/index.js';

export {
  MemoryCache,
  MemoryStore,
  FileStore,
  cacheKey,
  type FastCache,
  type PersistentStore,
} from './storage/index.js';

export {
  YouTubeClient,
  parseChannelReference,
  type YouTubeApi,
  type ChannelReference,
} from './youtube/index.js';

export * from './errors/index.js';
export * from './schemas/index.js';
export { createConsoleLogger, silentLogger, type Logger } from './logging/index.js';
