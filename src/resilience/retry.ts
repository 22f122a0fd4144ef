/**
 * Retry and Timeout Helpers
 *
 * Exponential backoff with jitter, and a Promise.race timeout for SDKs that
 * take no AbortSignal. Errors are rethrown unchanged so callers keep their
 * typed failures.
 *
 * @module resilience/retry
 */

import { isRetryableError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export interface RetryOptions {
  /** Total attempts including the first (default: 3) */
  maxAttempts?: number;
  /** Base delay in milliseconds for exponential backoff (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 8000) */
  maxDelayMs?: number;
  /** Add up to 30% random jitter (default: true) */
  jitter?: boolean;
  /** Decide whether a failure is worth another attempt (default: isRetryableError) */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Called before each wait */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  /** Wait implementation (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_RETRY = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 8000,
  jitter: true,
} as const;

// ============================================================================
// Functions
// ============================================================================

/**
 * Sleep helper for retry delays
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Exponential backoff delay
 *
 * @param attempt - Failed attempt number (1-based)
 */
export function calculateDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitter = true
): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt - 1));
  return jitter ? exponential + Math.random() * 0.3 * exponential : exponential;
}

/**
 * Execute a function with retry logic
 *
 * @param fn - Receives the 1-based attempt number
 * @throws The last error once attempts are exhausted or a failure is not retryable
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_RETRY.maxAttempts);
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY.baseDelayMs;
  const maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY.maxDelayMs;
  const jitter = options.jitter ?? DEFAULT_RETRY.jitter;
  const shouldRetry = options.shouldRetry ?? ((error: unknown) => isRetryableError(error));
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error, attempt)) {
        throw error;
      }
      const delay = calculateDelay(attempt, baseDelayMs, maxDelayMs, jitter);
      options.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}

/**
 * Execute a function with timeout using Promise.race pattern
 *
 * The underlying call keeps running after the timeout fires; only the
 * caller stops waiting for it.
 *
 * @param onTimeout - Builds the error thrown when the time budget is spent
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error
): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}
