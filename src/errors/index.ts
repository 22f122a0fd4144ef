/**
 * Error Taxonomy
 *
 * Typed failures surfaced by the resolution layer. Pure components never
 * throw; everything that touches a provider, the cache or the store fails
 * with one of these classes.
 *
 * @module errors
 */

// ============================================================================
// Types
// ============================================================================

export type ErrorCode =
  | 'INVALID_IDENTIFIER'
  | 'NOT_FOUND'
  | 'QUOTA_EXCEEDED'
  | 'PROVIDER_ERROR'
  | 'PROVIDER_TIMEOUT'
  | 'VALIDATION_ERROR'
  | 'PERSISTENCE_ERROR';

/** Which external collaborator a failure came from */
export type ProviderName = 'youtube' | 'gemini';

/**
 * JSON-serialisable error body for front ends
 */
export interface ErrorPayload {
  error: {
    code: ErrorCode | 'INTERNAL_ERROR';
    message: string;
    retryAfterMs?: number;
  };
}

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Base class for every typed failure in channelscope
 */
export class ChannelscopeError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ChannelscopeError';
  }
}

/**
 * The channel reference could not be parsed into a channel identifier
 */
export class InvalidIdentifierError extends ChannelscopeError {
  constructor(public readonly reference: string) {
    super(`Not a recognisable YouTube channel reference: "${reference}"`, 'INVALID_IDENTIFIER');
    this.name = 'InvalidIdentifierError';
  }
}

/**
 * The channel does not exist upstream
 */
export class ChannelNotFoundError extends ChannelscopeError {
  constructor(public readonly reference: string) {
    super(`Channel not found: ${reference}`, 'NOT_FOUND');
    this.name = 'ChannelNotFoundError';
  }
}

/**
 * No analysis is stored or cached for the channel (read-only lookups)
 */
export class AnalysisNotFoundError extends ChannelscopeError {
  constructor(public readonly channelId: string) {
    super(`No analysis available for channel ${channelId}`, 'NOT_FOUND');
    this.name = 'AnalysisNotFoundError';
  }
}

/**
 * A budget would be overshot by the requested call. Never retried
 * automatically; `retryAfterMs` is the time until the window resets.
 */
export class QuotaExceededError extends ChannelscopeError {
  constructor(
    message: string,
    public readonly provider: ProviderName,
    public readonly requested: number,
    public readonly remaining: number,
    public readonly retryAfterMs: number
  ) {
    super(message, 'QUOTA_EXCEEDED');
    this.name = 'QuotaExceededError';
  }
}

/**
 * An external provider call failed
 */
export class ProviderError extends ChannelscopeError {
  constructor(
    message: string,
    public readonly provider: ProviderName,
    public readonly statusCode: number,
    public readonly isRetryable: boolean,
    options?: { cause?: unknown; code?: ErrorCode }
  ) {
    super(message, options?.code ?? 'PROVIDER_ERROR', options);
    this.name = 'ProviderError';
  }
}

/**
 * An external provider call exceeded its time budget
 */
export class ProviderTimeoutError extends ProviderError {
  constructor(provider: ProviderName, public readonly timeoutMs: number) {
    super(`${provider} request timed out after ${timeoutMs}ms`, provider, 408, true, {
      code: 'PROVIDER_TIMEOUT',
    });
    this.name = 'ProviderTimeoutError';
  }
}

/**
 * The generative payload failed validation
 */
export class AnalysisValidationError extends ChannelscopeError {
  constructor(public readonly issues: string[]) {
    super(`Analysis payload rejected: ${issues.join('; ')}`, 'VALIDATION_ERROR');
    this.name = 'AnalysisValidationError';
  }
}

/**
 * Writing to the persistent store failed after a successful computation
 */
export class PersistenceError extends ChannelscopeError {
  constructor(
    public readonly operation: string,
    options?: { cause?: unknown }
  ) {
    // fs errors can come from another realm, so no instanceof check
    const cause = options?.cause;
    const detail =
      typeof cause === 'object' && cause !== null && 'message' in cause && typeof cause.message === 'string'
        ? `: ${cause.message}`
        : '';
    super(`Persistence failed during ${operation}${detail}`, 'PERSISTENCE_ERROR', options);
    this.name = 'PersistenceError';
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

export function isChannelscopeError(error: unknown): error is ChannelscopeError {
  return error instanceof ChannelscopeError;
}

export function isQuotaExceededError(error: unknown): error is QuotaExceededError {
  return error instanceof QuotaExceededError;
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}

export function isNotFoundError(
  error: unknown
): error is ChannelNotFoundError | AnalysisNotFoundError {
  return error instanceof ChannelNotFoundError || error instanceof AnalysisNotFoundError;
}

/**
 * Check if an error is transient and worth retrying at the call layer
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ProviderError) {
    return error.isRetryable;
  }
  if (error instanceof ChannelscopeError) {
    return false;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('fetch failed')
    );
  }
  return false;
}

/**
 * Convert any thrown value into the typed error body returned to callers
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof QuotaExceededError) {
    return {
      error: { code: error.code, message: error.message, retryAfterMs: error.retryAfterMs },
    };
  }
  if (error instanceof ChannelscopeError) {
    return { error: { code: error.code, message: error.message } };
  }
  return {
    error: {
      code: 'INTERNAL_ERROR',
      message: error instanceof Error ? error.message : String(error),
    },
  };
}
