/**
 * Model Configuration
 *
 * Defines the generative model, temperature and token budget used for
 * channel analysis. The model id can be overridden via ANALYSIS_MODEL.
 *
 * @module config/models
 */

/**
 * Model configuration for a specific task
 */
export interface ModelConfig {
  /** Model identifier */
  modelId: string;
  /** Temperature setting (0.0 - 2.0) */
  temperature: number;
  /** Maximum output tokens */
  maxOutputTokens: number;
  /** Environment variable for override */
  envOverride?: string;
}

/**
 * Task types that use LLM models
 */
export type TaskType = 'analysis';

const DEFAULT_MODELS: Record<TaskType, ModelConfig> = {
  analysis: {
    modelId: 'gemini-2.5-flash',
    temperature: 1.0,
    maxOutputTokens: 2048,
    envOverride: 'ANALYSIS_MODEL',
  },
};

/**
 * Get model configuration for a task, applying any environment overrides
 */
export function getModelConfig(
  task: TaskType,
  env: Record<string, string | undefined> = process.env
): ModelConfig {
  const defaultConfig = DEFAULT_MODELS[task];

  if (defaultConfig.envOverride) {
    const override = env[defaultConfig.envOverride];
    if (override) {
      return { ...defaultConfig, modelId: override };
    }
  }

  return defaultConfig;
}
