/**
 * Analysis Record Assembly
 *
 * @module analysis/record
 */

import type {
  AnalysisPayload,
  AnalysisRecord,
  ChannelRecord,
  SamplingStrategy,
  VideoRecord,
} from '../schemas/index.js';
import { SCHEMA_VERSIONS } from '../schemas/index.js';
import { computeExpiresAt } from '../staleness/index.js';

/**
 * Everything about a computation except the generated content
 */
export interface AnalysisContext {
  channel: ChannelRecord;
  /** Sampled videos, in sample order */
  sample: VideoRecord[];
  strategy: SamplingStrategy;
  analyzedAt: Date;
  stalenessWindowMs: number;
}

/**
 * Build the record for a validated generative payload.
 * `expiresAt` is always `analyzedAt + stalenessWindowMs`.
 */
export function buildAnalysisRecord(
  payload: AnalysisPayload,
  modelVersion: string,
  context: AnalysisContext
): AnalysisRecord {
  return {
    ...recordBase(context),
    summary: payload.summary,
    themes: payload.themes,
    targetAudience: payload.target_audience,
    contentStyle: payload.content_style,
    uploadFrequency: payload.upload_frequency,
    confidence: payload.confidence_score,
    modelVersion,
    degraded: false,
  };
}

export type AnalysisRecordBase = Pick<
  AnalysisRecord,
  | 'schemaVersion'
  | 'channelId'
  | 'sampleVideoIds'
  | 'samplingStrategy'
  | 'analyzedVideosCount'
  | 'totalVideosCount'
  | 'analyzedAt'
  | 'expiresAt'
>;

/**
 * Fields shared by generated and degraded records
 */
export function recordBase(context: AnalysisContext): AnalysisRecordBase {
  return {
    schemaVersion: SCHEMA_VERSIONS.analysis,
    channelId: context.channel.channelId,
    sampleVideoIds: context.sample.map((video) => video.videoId),
    samplingStrategy: context.strategy,
    analyzedVideosCount: context.sample.length,
    totalVideosCount: context.channel.videoCount,
    analyzedAt: context.analyzedAt.toISOString(),
    expiresAt: computeExpiresAt(context.analyzedAt, context.stalenessWindowMs),
  };
}
