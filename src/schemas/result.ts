/**
 * Analysis Result Schema
 *
 * JSON-serialisable shape handed to front ends by `resolve` and
 * `getExisting`.
 */

import { z } from 'zod';
import { ISO8601TimestampSchema } from './common.js';

/**
 * Where a returned analysis came from
 * - cached: fast cache hit, fresh
 * - stored: persistent store hit, fresh (cache repaired)
 * - stale: expired record served while a refresh runs in the background
 * - new: computed for this request
 */
export const FreshnessSchema = z.enum(['cached', 'stored', 'stale', 'new']);

export type Freshness = z.infer<typeof FreshnessSchema>;

/**
 * Display label derived from an analysis' age
 */
export const AgeLabelSchema = z.enum(['fresh', 'recent', 'aging', 'stale']);

export type AgeLabel = z.infer<typeof AgeLabelSchema>;

export const AnalysisResultSchema = z.object({
  channel: z.object({
    id: z.string(),
    title: z.string().nullable(),
    description: z.string().nullable(),
    customUrl: z.string().nullable(),
    thumbnailUrl: z.string().nullable(),
    subscriberCount: z.number().nullable(),
    videoCount: z.number().nullable(),
    viewCount: z.number().nullable(),
  }),
  analysis: z.object({
    summary: z.string(),
    themes: z.array(z.string()),
    targetAudience: z.string(),
    contentStyle: z.string(),
    uploadFrequency: z.string(),
    sampleVideoIds: z.array(z.string()),
  }),
  meta: z.object({
    analyzedAt: ISO8601TimestampSchema,
    expiresAt: ISO8601TimestampSchema,
    videosAnalyzed: z.number(),
    totalVideos: z.number(),
    freshness: FreshnessSchema,
    age: AgeLabelSchema,
    confidence: z.number(),
    modelVersion: z.string(),
    samplingStrategy: z.string(),
    degraded: z.boolean(),
  }),
});

export type AnalysisResult = z.infer<typeof AnalysisResultSchema>;
