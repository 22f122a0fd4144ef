/**
 * Generative Provider
 *
 * The one call shape the analysis layer needs from a generative model, and
 * its Gemini implementation on @google/generative-ai. Every call carries
 * its own timeout; failures are classified into ProviderError so the
 * generator can decide what to retry.
 *
 * @module analysis/gemini-provider
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import { requireApiKey } from '../config/index.js';
import { getModelConfig, type ModelConfig } from '../config/models.js';
import type { TokenUsage } from '../config/costs.js';
import { ProviderError, ProviderTimeoutError } from '../errors/index.js';
import { withTimeout } from '../resilience/index.js';

// ============================================================================
// Types
// ============================================================================

export interface GenerationRequest {
  prompt: string;
  /** Stable instruction sent ahead of the prompt */
  systemInstruction?: string;
  /** Ask for an application/json response */
  jsonMode?: boolean;
}

export interface GenerationResult {
  text: string;
  modelId: string;
  usage: TokenUsage;
}

/**
 * Anything that turns a prompt into text. Tests substitute an in-process
 * fake.
 */
export interface GenerativeProvider {
  readonly modelId: string;
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export interface GeminiProviderOptions {
  /** Default: GOOGLE_AI_API_KEY */
  apiKey?: string;
  /** Default: the analysis model from config/models */
  model?: Partial<ModelConfig>;
  /** Per-call timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /**
   * Send the system instruction as a separate stable prefix, which Gemini
   * can serve from its context cache. When false it is inlined into the
   * prompt text. Default: true
   */
  contextCaching?: boolean;
}

const DEFAULT_TIMEOUT_MS = 30000;

// ============================================================================
// Gemini Implementation
// ============================================================================

/**
 * @example
 * ```typescript
 * const provider = new GeminiProvider({ timeoutMs: 30_000 });
 * const result = await provider.generate({ prompt, jsonMode: true });
 * console.log(result.text, result.usage.outputTokens);
 * ```
 */
export class GeminiProvider implements GenerativeProvider {
  readonly modelId: string;
  private readonly model: ModelConfig;
  private readonly genAI: GoogleGenerativeAI;
  private readonly timeoutMs: number;
  private readonly contextCaching: boolean;

  /**
   * @throws Error if no API key is passed and GOOGLE_AI_API_KEY is not set
   */
  constructor(options: GeminiProviderOptions = {}) {
    this.model = { ...getModelConfig('analysis'), ...options.model };
    this.modelId = this.model.modelId;
    this.genAI = new GoogleGenerativeAI(options.apiKey ?? requireApiKey('googleAi'));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.contextCaching = options.contextCaching ?? true;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const separateInstruction = this.contextCaching && request.systemInstruction !== undefined;
    const model = this.genAI.getGenerativeModel({
      model: this.modelId,
      ...(separateInstruction && { systemInstruction: request.systemInstruction }),
    });
    const text =
      request.systemInstruction !== undefined && !separateInstruction
        ? `${request.systemInstruction}\n\n${request.prompt}`
        : request.prompt;

    const response = await withTimeout(
      async () => {
        try {
          return await model.generateContent({
            contents: [{ role: 'user', parts: [{ text }] }],
            generationConfig: {
              temperature: this.model.temperature,
              maxOutputTokens: this.model.maxOutputTokens,
              ...(request.jsonMode && { responseMimeType: 'application/json' }),
            },
          });
        } catch (error) {
          throw classifyGeminiError(error);
        }
      },
      this.timeoutMs,
      () => new ProviderTimeoutError('gemini', this.timeoutMs)
    );

    let output: string;
    try {
      output = response.response.text();
    } catch (error) {
      // text() throws when the candidate was blocked
      throw new ProviderError(
        `Gemini returned no usable candidate: ${error instanceof Error ? error.message : String(error)}`,
        'gemini',
        200,
        false,
        { cause: error }
      );
    }
    if (!output) {
      throw new ProviderError('Empty response from Gemini', 'gemini', 200, true);
    }

    const usage = response.response.usageMetadata;
    return {
      text: output,
      modelId: this.modelId,
      usage: {
        inputTokens: usage?.promptTokenCount ?? 0,
        outputTokens: usage?.candidatesTokenCount ?? 0,
        cachedInputTokens: usage?.cachedContentTokenCount ?? 0,
      },
    };
  }
}

// ============================================================================
// Error Classification
// ============================================================================

/**
 * Map an SDK failure to ProviderError: 429 and 5xx are retryable, other
 * HTTP statuses are not, and failures without a status (network) are.
 */
export function classifyGeminiError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const status =
    typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number'
      ? error.status
      : null;

  if (status === null) {
    return new ProviderError(`Gemini request failed: ${message}`, 'gemini', 0, true, {
      cause: error,
    });
  }
  if (status === 429) {
    return new ProviderError(`Rate limit exceeded: ${message}`, 'gemini', status, true, {
      cause: error,
    });
  }
  return new ProviderError(`Gemini API error (${status}): ${message}`, 'gemini', status, status >= 500, {
    cause: error,
  });
}
