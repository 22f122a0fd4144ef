/**
 * Configuration Module
 *
 * Loads and validates environment variables for channelscope.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { getDataDir } from '../storage/paths.js';
import { envSchema, toSettings, type Env } from './settings.js';

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env: Env = parseResult.data;

/**
 * Application configuration singleton
 */
export const config = {
  // Environment
  nodeEnv: env.NODE_ENV,
  isProduction: env.NODE_ENV === 'production',
  isDevelopment: env.NODE_ENV === 'development',
  isTest: env.NODE_ENV === 'test',
  logLevel: env.LOG_LEVEL,

  // API Keys
  apiKeys: {
    youtube: env.YOUTUBE_API_KEY,
    googleAi: env.GOOGLE_AI_API_KEY,
  },

  // Data directory
  dataDir: getDataDir({ CHANNELSCOPE_DATA_DIR: env.CHANNELSCOPE_DATA_DIR }),

  settings: toSettings(env),
} as const;

/**
 * Check if a specific API is configured
 */
export function hasApiKey(api: keyof typeof config.apiKeys): boolean {
  return !!config.apiKeys[api];
}

const API_KEY_VARIABLES: Record<keyof typeof config.apiKeys, string> = {
  youtube: 'YOUTUBE_API_KEY',
  googleAi: 'GOOGLE_AI_API_KEY',
};

/**
 * Get an API key or throw if not configured
 */
export function requireApiKey(api: keyof typeof config.apiKeys): string {
  const key = config.apiKeys[api];
  if (!key) {
    throw new Error(
      `Missing required API key: ${API_KEY_VARIABLES[api]}. ` +
        `Please set it in your .env file.`
    );
  }
  return key;
}

// Re-export types
export type Config = typeof config;
export type ApiKeyName = keyof typeof config.apiKeys;

// Re-export settings, cost and model configuration
export { parseSettings, type ResolverSettings } from './settings.js';
export * from './costs.js';
export * from './models.js';
