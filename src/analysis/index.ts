/**
 * Analysis Module
 *
 * Prompt assembly, generation and record building for channel analyses.
 *
 * @module analysis
 */

export { buildAnalysisPrompt, ANALYSIS_SYSTEM_PROMPT, PROMPT_LIMITS } from './prompts.js';

export {
  GeminiProvider,
  classifyGeminiError,
  type GenerativeProvider,
  type GenerationRequest,
  type GenerationResult,
  type GeminiProviderOptions,
} from './gemini-provider.js';

export {
  AnalysisGenerator,
  parseAnalysisPayload,
  extractJson,
  type AnalysisGeneratorOptions,
  type GeneratedAnalysis,
  type PayloadParseResult,
} from './generator.js';

export {
  buildAnalysisRecord,
  recordBase,
  type AnalysisContext,
  type AnalysisRecordBase,
} from './record.js';

export {
  buildDegradedAnalysis,
  estimateUploadFrequency,
  topTags,
  DEGRADED_MODEL_VERSION,
  DEGRADED_CONFIDENCE,
} from './degraded.js';
