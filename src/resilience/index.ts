/**
 * Resilience Helpers
 *
 * @module resilience
 */

export { withRetry, withTimeout, calculateDelay, sleep, type RetryOptions } from './retry.js';
