/**
 * Resolution Module
 *
 * Cache, store and single-flight orchestration of channel analyses.
 *
 * @module resolution
 */

export {
  ResolutionEngine,
  type ResolutionEngineOptions,
  type Computation,
  type CacheTtls,
} from './engine.js';

export {
  AnalysisComputation,
  type ComputationOptions,
  type ComputedAnalysis,
} from './computation.js';

export { SingleFlightCoordinator, type SingleFlightOptions } from './single-flight.js';

export { ConcurrencyLimiter, type LimiterStats } from './limiter.js';

export {
  CacheResolver,
  StoreResolver,
  type TierResolver,
  type TierLookup,
  type TierName,
} from './resolvers.js';

export { toAnalysisResult, type ResolvedAnalysis } from './result.js';

export {
  createResolutionEngine,
  type EngineDependencies,
  type EngineBundle,
} from './factory.js';
