/**
 * Analysis Generator
 *
 * Sends an assembled prompt to a GenerativeProvider and validates the
 * returned payload. Transient provider failures (timeouts, rate limits,
 * 5xx) are retried with backoff; a payload that fails validation gets one
 * more generation with the same prompt before AnalysisValidationError.
 *
 * @module analysis/generator
 */

import type { TokenUsage } from '../config/costs.js';
import { AnalysisValidationError, isRetryableError } from '../errors/index.js';
import { describeError, type Logger } from '../logging/index.js';
import type { QuotaLedger } from '../quota/index.js';
import { withRetry } from '../resilience/index.js';
import { AnalysisPayloadSchema, type AnalysisPayload } from '../schemas/index.js';
import type { GenerativeProvider } from './gemini-provider.js';
import { ANALYSIS_SYSTEM_PROMPT } from './prompts.js';

// ============================================================================
// Types
// ============================================================================

export interface AnalysisGeneratorOptions {
  provider: GenerativeProvider;
  /** Receives token usage of every completed generation */
  ledger?: QuotaLedger;
  /** Provider attempts per generation, including the first (default: 3) */
  maxAttempts?: number;
  /** Base backoff delay in milliseconds (default: 1000) */
  retryBaseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface GeneratedAnalysis {
  payload: AnalysisPayload;
  modelId: string;
  /** Usage summed over every generation this call made */
  usage: TokenUsage;
}

export type PayloadParseResult =
  | { success: true; payload: AnalysisPayload }
  | { success: false; issues: string[] };

/** One regeneration after a payload fails validation */
const VALIDATION_ATTEMPTS = 2;

// ============================================================================
// AnalysisGenerator Class
// ============================================================================

export class AnalysisGenerator {
  private readonly provider: GenerativeProvider;
  private readonly ledger?: QuotaLedger;
  private readonly maxAttempts: number;
  private readonly retryBaseDelayMs: number;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly logger?: Logger;

  constructor(options: AnalysisGeneratorOptions) {
    this.provider = options.provider;
    this.ledger = options.ledger;
    this.maxAttempts = options.maxAttempts ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.sleep = options.sleep;
    this.logger = options.logger;
  }

  get modelId(): string {
    return this.provider.modelId;
  }

  /**
   * @throws ProviderError when retries are exhausted or the failure is permanent
   * @throws AnalysisValidationError when both generations fail validation
   */
  async generate(prompt: string): Promise<GeneratedAnalysis> {
    const usage: TokenUsage = { inputTokens: 0, outputTokens: 0, cachedInputTokens: 0 };
    let issues: string[] = [];

    for (let attempt = 1; attempt <= VALIDATION_ATTEMPTS; attempt++) {
      const result = await withRetry(
        () =>
          this.provider.generate({
            prompt,
            systemInstruction: ANALYSIS_SYSTEM_PROMPT,
            jsonMode: true,
          }),
        {
          maxAttempts: this.maxAttempts,
          baseDelayMs: this.retryBaseDelayMs,
          sleep: this.sleep,
          shouldRetry: isRetryableError,
          onRetry: (error, failed, delayMs) => {
            this.logger?.warn(
              `[generate] Attempt ${failed}/${this.maxAttempts} failed (${describeError(error)}), retrying in ${Math.round(delayMs)}ms`
            );
          },
        }
      );

      usage.inputTokens += result.usage.inputTokens;
      usage.outputTokens += result.usage.outputTokens;
      usage.cachedInputTokens += result.usage.cachedInputTokens;
      this.ledger?.recordAiUsage(result.usage);

      const parsed = parseAnalysisPayload(result.text);
      if (parsed.success) {
        return { payload: parsed.payload, modelId: result.modelId, usage };
      }

      issues = parsed.issues;
      this.logger?.warn(
        `[generate] Payload rejected (${attempt}/${VALIDATION_ATTEMPTS}): ${issues.join('; ')}`
      );
    }

    throw new AnalysisValidationError(issues);
  }
}

// ============================================================================
// Payload Parsing
// ============================================================================

/**
 * Validate raw model output against the analysis payload schema
 */
export function parseAnalysisPayload(text: string): PayloadParseResult {
  const data = extractJson(text);
  if (data === undefined) {
    return { success: false, issues: [`response is not JSON: ${text.substring(0, 200)}`] };
  }

  const result = AnalysisPayloadSchema.safeParse(data);
  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      ),
    };
  }
  return { success: true, payload: result.data };
}

/**
 * Extract a JSON value from model output that may be wrapped in a
 * markdown code block or surrounded by prose.
 *
 * @returns undefined when no JSON can be parsed
 */
export function extractJson(text: string): unknown {
  let cleanText = text.trim();

  // Handle markdown code blocks (```json ... ``` or ``` ... ```)
  const codeBlockMatch = cleanText.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (codeBlockMatch?.[1] !== undefined) {
    cleanText = codeBlockMatch[1].trim();
  }

  if (!cleanText.startsWith('{') && !cleanText.startsWith('[')) {
    const jsonMatch = cleanText.match(/(\{[\s\S]*\}|\[[\s\S]*\])/);
    if (jsonMatch?.[1] !== undefined) {
      cleanText = jsonMatch[1];
    }
  }

  try {
    const parsed: unknown = JSON.parse(cleanText);
    return parsed;
  } catch {
    return undefined;
  }
}
