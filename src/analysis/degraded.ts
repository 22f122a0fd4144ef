/**
 * Degraded Analysis
 *
 * Metadata-only record produced when generation is unavailable or its
 * output keeps failing validation. Everything here is derived from data
 * the metadata provider already returned, so it costs nothing.
 *
 * @module analysis/degraded
 */

import type { AnalysisRecord, VideoRecord } from '../schemas/index.js';
import { recordBase, type AnalysisContext } from './record.js';

export const DEGRADED_MODEL_VERSION = 'metadata-only';
export const DEGRADED_CONFIDENCE = 0.2;

const MAX_THEMES = 5;
/** Uploads considered when estimating cadence */
const CADENCE_WINDOW = 20;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Build a degraded record.
 *
 * @param videos - All known videos of the channel; cadence is estimated
 *   from the most recent ones. Defaults to the sample.
 */
export function buildDegradedAnalysis(
  context: AnalysisContext,
  videos: VideoRecord[] = context.sample
): AnalysisRecord {
  return {
    ...recordBase(context),
    summary: describeChannel(context),
    themes: topTags(context.sample, MAX_THEMES),
    targetAudience: '',
    contentStyle: '',
    uploadFrequency: estimateUploadFrequency(videos),
    confidence: DEGRADED_CONFIDENCE,
    modelVersion: DEGRADED_MODEL_VERSION,
    degraded: true,
  };
}

function describeChannel({ channel, sample }: AnalysisContext): string {
  const parts = [
    `${channel.title} is a YouTube channel with ${channel.subscriberCount.toLocaleString('en-US')} subscribers and ${channel.videoCount.toLocaleString('en-US')} videos.`,
  ];
  const description = channel.description.replace(/\s+/g, ' ').trim();
  if (description) {
    parts.push(description.length > 300 ? `${description.slice(0, 300)}...` : description);
  }
  parts.push(
    `This overview was built from channel metadata and ${sample.length} sampled video(s) without AI analysis.`
  );
  return parts.join(' ');
}

/**
 * Most frequent tags across the videos, case-insensitive; ties are broken
 * alphabetically.
 */
export function topTags(videos: VideoRecord[], limit: number): string[] {
  const counts = new Map<string, number>();
  for (const video of videos) {
    const unique = new Set(video.tags.map((tag) => tag.trim().toLowerCase()).filter(Boolean));
    for (const tag of unique) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
    .slice(0, limit)
    .map(([tag]) => tag);
}

/**
 * Describe upload cadence from the median gap between recent uploads
 */
export function estimateUploadFrequency(videos: VideoRecord[]): string {
  const times = videos
    .map((video) => Date.parse(video.publishedAt))
    .filter((time) => Number.isFinite(time))
    .sort((a, b) => b - a)
    .slice(0, CADENCE_WINDOW);
  if (times.length < 2) {
    return 'unknown';
  }

  const gaps = times
    .slice(1)
    .map((time, i) => (times[i] - time) / DAY_MS)
    .sort((a, b) => a - b);
  const middle = Math.floor(gaps.length / 2);
  const median = gaps.length % 2 === 1 ? gaps[middle] : (gaps[middle - 1] + gaps[middle]) / 2;

  if (median <= 1.5) return 'daily';
  if (median <= 4) return '2-3 times per week';
  if (median <= 10) return 'weekly';
  if (median <= 21) return 'every 2-3 weeks';
  if (median <= 45) return 'monthly';
  return 'irregular';
}
