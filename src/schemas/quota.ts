/**
 * Quota Snapshot Schema
 *
 * Persisted state of a QuotaLedger's current accounting window, so that
 * short-lived processes (the CLI) share one daily budget.
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import { CounterSchema, ISO8601TimestampSchema, schemaVersionField } from './common.js';

export const QuotaSnapshotSchema = z.object({
  schemaVersion: schemaVersionField(SCHEMA_VERSIONS.quota),
  windowStart: ISO8601TimestampSchema,
  windowMs: z.number().int().positive(),
  unitsConsumed: CounterSchema,
  /** Units per metadata-provider operation */
  byOperation: z.record(z.string(), CounterSchema),
  ai: z.object({
    generations: CounterSchema,
    inputTokens: CounterSchema,
    outputTokens: CounterSchema,
    cachedInputTokens: CounterSchema,
    costUsd: z.number().nonnegative(),
  }),
});

export type QuotaSnapshot = z.infer<typeof QuotaSnapshotSchema>;
