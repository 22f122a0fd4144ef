/**
 * Staleness Module
 *
 * @module staleness
 */

export {
  classify,
  ageLabel,
  computeExpiresAt,
  FRESH_LABEL_MS,
  RECENT_LABEL_MS,
  type Staleness,
  type Expiring,
} from './policy.js';
