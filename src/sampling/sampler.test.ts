/**
 * Tests for the video sampler
 *
 * @module sampling/sampler.test
 */

import { describe, it, expect } from '@jest/globals';
import { sampleVideos, selectStrategy, type SampleableVideo } from './sampler.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const EPOCH = Date.parse('2020-01-01T00:00:00.000Z');

/**
 * `count` videos, v0000 oldest, one per day
 */
function makeVideos(count: number): SampleableVideo[] {
  return Array.from({ length: count }, (_, i) => ({
    videoId: `v${String(i).padStart(4, '0')}`,
    publishedAt: new Date(EPOCH + i * DAY_MS).toISOString(),
  }));
}

function ids(videos: SampleableVideo[]): string[] {
  return videos.map((video) => video.videoId);
}

describe('sampleVideos', () => {
  it('should return every video for a 10-video channel', () => {
    const videos = makeVideos(10);
    const result = sampleVideos(videos, 50);

    expect(result.strategy).toBe('all_videos');
    expect(result.videos).toHaveLength(10);
    expect(new Set(ids(result.videos))).toEqual(new Set(ids(videos)));
  });

  it('should order output newest first', () => {
    const result = sampleVideos(makeVideos(3), 50);
    expect(ids(result.videos)).toEqual(['v0002', 'v0001', 'v0000']);
  });

  it('should keep the 30 most recent of a 200-video channel', () => {
    const videos = makeVideos(200);
    const result = sampleVideos(videos, 50);
    const sampled = new Set(ids(result.videos));

    expect(result.strategy).toBe('recent_distributed');
    expect(result.videos).toHaveLength(50);
    for (let i = 170; i < 200; i++) {
      expect(sampled.has(`v${String(i).padStart(4, '0')}`)).toBe(true);
    }
  });

  it('should spread the rest across the catalogue and backfill overlaps', () => {
    const result = sampleVideos(makeVideos(200), 50);
    const sampled = new Set(ids(result.videos));

    // Oldest upload is the last evenly spaced pick
    expect(sampled.has('v0000')).toBe(true);
    // Spread picks at 31 and 41 positions from the newest
    expect(sampled.has('v0168')).toBe(true);
    expect(sampled.has('v0158')).toBe(true);
    // Overlapping picks are replaced by the next most recent unselected ones
    expect(sampled.has('v0169')).toBe(true);
    expect(sampled.has('v0167')).toBe(true);
    expect(sampled.has('v0166')).toBe(true);
    expect(sampled.has('v0165')).toBe(false);
  });

  it('should use the 25 + 25 split for 500 or more videos', () => {
    const result = sampleVideos(makeVideos(600), 50);
    const sampled = new Set(ids(result.videos));

    expect(result.strategy).toBe('large_channel_sample');
    expect(result.videos).toHaveLength(50);
    expect(sampled.has('v0599')).toBe(true);
    expect(sampled.has('v0575')).toBe(true);
    expect(sampled.has('v0000')).toBe(true);
  });

  it('should return min(n, 50) unique videos for any catalogue size', () => {
    for (const n of [0, 1, 10, 49, 50, 51, 137, 200, 499, 500, 1234]) {
      const result = sampleVideos(makeVideos(n), 50);
      expect(result.videos).toHaveLength(Math.min(n, 50));
      expect(new Set(ids(result.videos)).size).toBe(result.videos.length);
    }
  });

  it('should be deterministic regardless of input order', () => {
    const videos = makeVideos(321);
    const reversed = [...videos].reverse();
    const interleaved = [
      ...videos.filter((_, i) => i % 2 === 0),
      ...videos.filter((_, i) => i % 2 === 1),
    ];

    const first = ids(sampleVideos(videos, 50).videos);
    expect(ids(sampleVideos(videos, 50).videos)).toEqual(first);
    expect(ids(sampleVideos(reversed, 50).videos)).toEqual(first);
    expect(ids(sampleVideos(interleaved, 50).videos)).toEqual(first);
  });

  it('should never exceed a smaller maxSample', () => {
    const result = sampleVideos(makeVideos(200), 20);
    expect(ids(result.videos)).toEqual(
      Array.from({ length: 20 }, (_, i) => `v${String(199 - i).padStart(4, '0')}`)
    );
  });

  it('should drop duplicate ids in the input', () => {
    const videos = makeVideos(5);
    const result = sampleVideos([...videos, ...videos], 50);
    expect(result.videos).toHaveLength(5);
  });

  it('should break publish-time ties by id', () => {
    const publishedAt = '2024-01-01T00:00:00.000Z';
    const result = sampleVideos(
      [
        { videoId: 'b', publishedAt },
        { videoId: 'a', publishedAt },
      ],
      50
    );
    expect(ids(result.videos)).toEqual(['a', 'b']);
  });
});

describe('selectStrategy', () => {
  it('should switch at 50 and 500 videos', () => {
    expect(selectStrategy(49)).toBe('all_videos');
    expect(selectStrategy(50)).toBe('recent_distributed');
    expect(selectStrategy(499)).toBe('recent_distributed');
    expect(selectStrategy(500)).toBe('large_channel_sample');
  });
});
