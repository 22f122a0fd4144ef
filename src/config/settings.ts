/**
 * Resolver Settings
 *
 * Environment schema and its mapping onto the settings the resolution
 * layer takes. Free of side effects: nothing here reads process.env.
 *
 * @module config/settings
 */

import { z } from 'zod';
import { getModelConfig } from './models.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const positiveInt = z.coerce.number().int().positive();

// Environment schema with optional values and defaults
export const envSchema = z.object({
  // API Keys (required for fresh analysis, but allow starting without them)
  YOUTUBE_API_KEY: z.string().optional(),
  GOOGLE_AI_API_KEY: z.string().optional(),

  // Data directory
  CHANNELSCOPE_DATA_DIR: z.string().optional(),

  // Model override
  ANALYSIS_MODEL: z.string().optional(),

  // Quota
  QUOTA_DAILY_BUDGET: positiveInt.default(10_000),
  QUOTA_WINDOW_HOURS: positiveInt.default(24),
  AI_DAILY_BUDGET_USD: z.coerce.number().positive().optional(),

  // Staleness and cache TTLs
  STALENESS_WINDOW_DAYS: positiveInt.default(30),
  CACHE_TTL_ANALYSIS_SECONDS: positiveInt.default(604_800),
  CACHE_TTL_CHANNEL_META_SECONDS: positiveInt.default(604_800),
  CACHE_TTL_VIDEO_LIST_SECONDS: positiveInt.default(86_400),
  CACHE_TTL_URL_MAPPING_SECONDS: positiveInt.default(86_400),

  // Sampling and fetching
  MAX_SAMPLE_SIZE: positiveInt.default(50),
  MAX_VIDEO_PAGES: positiveInt.default(10),
  METADATA_TIMEOUT_MS: positiveInt.default(10_000),
  GENERATION_TIMEOUT_MS: positiveInt.default(30_000),
  GENERATION_MAX_ATTEMPTS: positiveInt.default(3),
  MAX_CONCURRENT_ANALYSES: positiveInt.default(4),

  // Behaviour toggles
  DEGRADED_MODE: booleanFlag.default('true'),
  ENABLE_CONTEXT_CACHING: booleanFlag.default('true'),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Tunables for the resolution layer, independent of where they came from.
 */
export interface ResolverSettings {
  quota: {
    /** Metadata-provider units allowed per accounting window */
    dailyBudget: number;
    /** Accounting window length */
    windowMs: number;
    /** Generative spend ceiling per window; null means unlimited */
    aiDailyBudgetUsd: number | null;
  };
  /** Age after which an analysis is stale (expiresAt = analyzedAt + this) */
  stalenessWindowMs: number;
  cacheTtlSeconds: {
    analysis: number;
    channelMeta: number;
    videoList: number;
    urlMapping: number;
  };
  maxSampleSize: number;
  metadata: {
    maxPages: number;
    timeoutMs: number;
  };
  generation: {
    modelId: string;
    timeoutMs: number;
    maxAttempts: number;
    enableContextCaching: boolean;
  };
  maxConcurrentAnalyses: number;
  degradedMode: boolean;
}

export function toSettings(env: Env): ResolverSettings {
  return {
    quota: {
      dailyBudget: env.QUOTA_DAILY_BUDGET,
      windowMs: env.QUOTA_WINDOW_HOURS * HOUR_MS,
      aiDailyBudgetUsd: env.AI_DAILY_BUDGET_USD ?? null,
    },
    stalenessWindowMs: env.STALENESS_WINDOW_DAYS * DAY_MS,
    cacheTtlSeconds: {
      analysis: env.CACHE_TTL_ANALYSIS_SECONDS,
      channelMeta: env.CACHE_TTL_CHANNEL_META_SECONDS,
      videoList: env.CACHE_TTL_VIDEO_LIST_SECONDS,
      urlMapping: env.CACHE_TTL_URL_MAPPING_SECONDS,
    },
    maxSampleSize: env.MAX_SAMPLE_SIZE,
    metadata: {
      maxPages: env.MAX_VIDEO_PAGES,
      timeoutMs: env.METADATA_TIMEOUT_MS,
    },
    generation: {
      modelId: getModelConfig('analysis', { ANALYSIS_MODEL: env.ANALYSIS_MODEL }).modelId,
      timeoutMs: env.GENERATION_TIMEOUT_MS,
      maxAttempts: env.GENERATION_MAX_ATTEMPTS,
      enableContextCaching: env.ENABLE_CONTEXT_CACHING,
    },
    maxConcurrentAnalyses: env.MAX_CONCURRENT_ANALYSES,
    degradedMode: env.DEGRADED_MODE,
  };
}

/**
 * Build resolver settings from an arbitrary environment record.
 *
 * @throws ZodError when a value is present but invalid
 */
export function parseSettings(env: Record<string, string | undefined>): ResolverSettings {
  return toSettings(envSchema.parse(env));
}
