/**
 * Result Shaping
 *
 * @module resolution/result
 */

import type {
  AnalysisRecord,
  AnalysisResult,
  ChannelRecord,
  Freshness,
} from '../schemas/index.js';
import { ageLabel } from '../staleness/index.js';

/**
 * An analysis as handed out by the engine, before serialisation
 */
export interface ResolvedAnalysis {
  record: AnalysisRecord;
  /** Known channel metadata; null when neither cache nor store has it */
  channel: ChannelRecord | null;
  freshness: Freshness;
}

/**
 * JSON-serialisable shape for front ends
 */
export function toAnalysisResult(resolved: ResolvedAnalysis, now: Date): AnalysisResult {
  const { record, channel, freshness } = resolved;
  return {
    channel: {
      id: record.channelId,
      title: channel?.title ?? null,
      description: channel?.description ?? null,
      customUrl: channel?.customUrl ?? null,
      thumbnailUrl: channel?.thumbnailUrl ?? null,
      subscriberCount: channel?.subscriberCount ?? null,
      videoCount: channel?.videoCount ?? null,
      viewCount: channel?.viewCount ?? null,
    },
    analysis: {
      summary: record.summary,
      themes: record.themes,
      targetAudience: record.targetAudience,
      contentStyle: record.contentStyle,
      uploadFrequency: record.uploadFrequency,
      sampleVideoIds: record.sampleVideoIds,
    },
    meta: {
      analyzedAt: record.analyzedAt,
      expiresAt: record.expiresAt,
      videosAnalyzed: record.analyzedVideosCount,
      totalVideos: record.totalVideosCount,
      freshness,
      age: ageLabel(record, now),
      confidence: record.confidence,
      modelVersion: record.modelVersion,
      samplingStrategy: record.samplingStrategy,
      degraded: record.degraded,
    },
  };
}
