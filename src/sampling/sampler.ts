/**
 * Video Sampler
 *
 * Picks a bounded, representative subset of a channel's uploads for
 * analysis: the most recent videos plus a spread across the whole
 * catalogue. Deterministic for identical input, with no randomness, so the
 * sample ids stored on an analysis can reproduce it.
 *
 * @module sampling/sampler
 */

import type { SamplingStrategy } from '../schemas/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Minimum a video needs for sampling
 */
export interface SampleableVideo {
  videoId: string;
  publishedAt: string;
}

export interface SampleResult<T extends SampleableVideo> {
  /** Selected videos, newest first */
  videos: T[];
  strategy: SamplingStrategy;
}

interface SamplingPlan {
  strategy: SamplingStrategy;
  recent: number;
  distributed: number;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_MAX_SAMPLE = 50;

/** Channels with fewer videos than this are analysed in full */
export const SMALL_CHANNEL_THRESHOLD = 50;

/** Channels with at least this many videos use the large-channel split */
export const LARGE_CHANNEL_THRESHOLD = 500;

// ============================================================================
// Sampling
// ============================================================================

/**
 * Sample videos for analysis.
 *
 * - fewer than 50 videos: all of them
 * - 50 to 499: 30 most recent + 20 evenly spaced by index
 * - 500 or more: 25 most recent + 25 evenly spaced by index
 *
 * Overlaps between the two sets are removed by id and the shortfall is
 * backfilled from the next most recent unselected video. The result never
 * exceeds `maxSample`.
 *
 * @example
 * const { videos, strategy } = sampleVideos(uploads, 50);
 */
export function sampleVideos<T extends SampleableVideo>(
  allVideos: readonly T[],
  maxSample: number = DEFAULT_MAX_SAMPLE
): SampleResult<T> {
  const ordered = orderByRecency(allVideos);
  const limit = Math.max(0, Math.floor(maxSample));
  const plan = planFor(ordered.length);

  if (plan.strategy === 'all_videos') {
    return { videos: ordered.slice(0, limit), strategy: plan.strategy };
  }

  const recentCount = Math.min(plan.recent, limit);
  const distributedCount = Math.min(plan.distributed, limit - recentCount);
  const target = Math.min(ordered.length, limit, plan.recent + plan.distributed);

  const selected = new Set<number>();
  for (let i = 0; i < recentCount; i++) {
    selected.add(i);
  }
  for (const index of spreadIndices(ordered.length, distributedCount)) {
    selected.add(index);
  }

  // Backfill duplicates with the next most recent unselected videos
  for (let i = 0; selected.size < target && i < ordered.length; i++) {
    selected.add(i);
  }

  const indices = [...selected].sort((a, b) => a - b).slice(0, target);
  return {
    videos: indices.map((index) => ordered[index]).filter(isDefined),
    strategy: plan.strategy,
  };
}

/**
 * Strategy that `sampleVideos` would use for a catalogue of this size
 */
export function selectStrategy(videoCount: number): SamplingStrategy {
  return planFor(videoCount).strategy;
}

// ============================================================================
// Helper Functions
// ============================================================================

function planFor(videoCount: number): SamplingPlan {
  if (videoCount < SMALL_CHANNEL_THRESHOLD) {
    return { strategy: 'all_videos', recent: videoCount, distributed: 0 };
  }
  if (videoCount < LARGE_CHANNEL_THRESHOLD) {
    return { strategy: 'recent_distributed', recent: 30, distributed: 20 };
  }
  return { strategy: 'large_channel_sample', recent: 25, distributed: 25 };
}

/**
 * Newest first, unique by id. Ties on publish time fall back to id order;
 * unparseable dates sort last.
 */
function orderByRecency<T extends SampleableVideo>(videos: readonly T[]): T[] {
  const time = (video: T): number => {
    const parsed = Date.parse(video.publishedAt);
    return Number.isNaN(parsed) ? Number.NEGATIVE_INFINITY : parsed;
  };

  const sorted = [...videos].sort((a, b) => {
    const diff = time(b) - time(a);
    if (diff !== 0 && !Number.isNaN(diff)) {
      return diff;
    }
    return a.videoId < b.videoId ? -1 : a.videoId > b.videoId ? 1 : 0;
  });

  const seen = new Set<string>();
  return sorted.filter((video) => {
    if (seen.has(video.videoId)) {
      return false;
    }
    seen.add(video.videoId);
    return true;
  });
}

/**
 * `count` indices spread evenly over [0, length - 1], both ends included
 */
function spreadIndices(length: number, count: number): number[] {
  if (count <= 0 || length === 0) {
    return [];
  }
  if (count === 1) {
    return [0];
  }
  const indices: number[] = [];
  for (let i = 0; i < count; i++) {
    indices.push(Math.floor((i * (length - 1)) / (count - 1)));
  }
  return indices;
}

function isDefined<T>(value: T | undefined): value is T {
  return value !== undefined;
}
