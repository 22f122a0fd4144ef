/**
 * Analysis Schemas
 *
 * - AnalysisRecord: the one current analysis per channel, as persisted
 * - AnalysisPayload: the JSON object the generative model is asked to return
 * - AnalysisHistoryEntry: audit trail of replaced analyses
 */

import { z } from 'zod';
import { SCHEMA_VERSIONS } from './versions.js';
import {
  ChannelIdSchema,
  CounterSchema,
  ISO8601TimestampSchema,
  schemaVersionField,
} from './common.js';

// ============================================
// Constants
// ============================================

/** Minimum summary length accepted from the model */
export const MIN_SUMMARY_LENGTH = 100;

/** Confidence used when the model omits its self-estimate */
export const DEFAULT_CONFIDENCE = 0.5;

// ============================================
// Sampling Strategy
// ============================================

/**
 * How the video sample behind an analysis was drawn
 * - all_videos: fewer than 50 videos, all used
 * - recent_distributed: 50-499 videos, 30 recent + 20 spread
 * - large_channel_sample: 500+ videos, 25 recent + 25 spread
 */
export const SamplingStrategySchema = z.enum([
  'all_videos',
  'recent_distributed',
  'large_channel_sample',
]);

export type SamplingStrategy = z.infer<typeof SamplingStrategySchema>;

// ============================================
// Analysis Record
// ============================================

export const AnalysisRecordSchema = z
  .object({
    schemaVersion: schemaVersionField(SCHEMA_VERSIONS.analysis),
    channelId: ChannelIdSchema,
    summary: z.string().min(1),
    themes: z.array(z.string()),
    targetAudience: z.string(),
    contentStyle: z.string(),
    uploadFrequency: z.string(),
    /** Video ids the analysis was computed from, in sample order */
    sampleVideoIds: z.array(z.string()),
    samplingStrategy: SamplingStrategySchema,
    analyzedVideosCount: CounterSchema,
    /** Channel's own video counter at analysis time */
    totalVideosCount: CounterSchema,
    confidence: z.number().min(0).max(1),
    analyzedAt: ISO8601TimestampSchema,
    expiresAt: ISO8601TimestampSchema,
    /** Generative model id, or "metadata-only" for degraded records */
    modelVersion: z.string().min(1),
    degraded: z.boolean(),
  })
  .refine((record) => Date.parse(record.expiresAt) >= Date.parse(record.analyzedAt), {
    message: 'expiresAt must not precede analyzedAt',
    path: ['expiresAt'],
  });

export type AnalysisRecord = z.infer<typeof AnalysisRecordSchema>;

// ============================================
// Generative Payload
// ============================================

const confidenceInput = z
  .union([z.number(), z.string().trim().min(1)])
  .nullish()
  .transform((value, ctx) => {
    if (value === null || value === undefined) {
      return DEFAULT_CONFIDENCE;
    }
    const parsed = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `confidence_score must be a number in [0, 1], got ${JSON.stringify(value)}`,
      });
      return z.NEVER;
    }
    return parsed;
  });

/**
 * Shape the model is instructed to return (snake_case as in the prompt).
 * Parsing yields the validated, normalised payload.
 */
export const AnalysisPayloadSchema = z.object({
  summary: z
    .string()
    .trim()
    .min(MIN_SUMMARY_LENGTH, `summary must be at least ${MIN_SUMMARY_LENGTH} characters`),
  themes: z
    .array(z.string().trim().min(1))
    .min(1, 'themes must contain at least one entry'),
  target_audience: z.string().trim().default(''),
  content_style: z.string().trim().default(''),
  upload_frequency: z.string().trim().default(''),
  confidence_score: confidenceInput,
});

export type AnalysisPayloadInput = z.input<typeof AnalysisPayloadSchema>;
export type AnalysisPayload = z.output<typeof AnalysisPayloadSchema>;

// ============================================
// History
// ============================================

export const AnalysisHistoryEntrySchema = z.object({
  analyzedAt: ISO8601TimestampSchema,
  modelVersion: z.string(),
  degraded: z.boolean(),
  replacedAt: ISO8601TimestampSchema,
});

export type AnalysisHistoryEntry = z.infer<typeof AnalysisHistoryEntrySchema>;
