/**
 * Staleness Policy
 *
 * Classifies an analysis by its expiry and derives the display age label.
 * Both functions are total: they never throw, whatever the record holds.
 *
 * @module staleness/policy
 */

import type { AgeLabel } from '../schemas/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Age below which an analysis is labelled "fresh" */
export const FRESH_LABEL_MS = 7 * DAY_MS;

/** Age below which an analysis is labelled "recent" */
export const RECENT_LABEL_MS = 14 * DAY_MS;

export type Staleness = 'FRESH' | 'STALE' | 'MISSING';

/**
 * The only fields staleness depends on
 */
export interface Expiring {
  analyzedAt: string;
  expiresAt: string;
}

/**
 * Classify a record at a point in time.
 *
 * MISSING when there is no record, STALE once `now` is past `expiresAt`,
 * FRESH otherwise. An unparseable `expiresAt` counts as STALE so the record
 * is still served but gets recomputed.
 */
export function classify(record: Expiring | null | undefined, now: Date): Staleness {
  if (!record) {
    return 'MISSING';
  }
  const expiresAt = Date.parse(record.expiresAt);
  if (Number.isNaN(expiresAt)) {
    return 'STALE';
  }
  return now.getTime() > expiresAt ? 'STALE' : 'FRESH';
}

/**
 * Display label for an existing record
 */
export function ageLabel(record: Expiring, now: Date): AgeLabel {
  if (classify(record, now) === 'STALE') {
    return 'stale';
  }
  const analyzedAt = Date.parse(record.analyzedAt);
  if (Number.isNaN(analyzedAt)) {
    return 'aging';
  }
  const age = now.getTime() - analyzedAt;
  if (age < FRESH_LABEL_MS) {
    return 'fresh';
  }
  if (age < RECENT_LABEL_MS) {
    return 'recent';
  }
  return 'aging';
}

/**
 * Expiry timestamp for an analysis computed at `analyzedAt`
 */
export function computeExpiresAt(analyzedAt: Date, stalenessWindowMs: number): string {
  return new Date(analyzedAt.getTime() + stalenessWindowMs).toISOString();
}
