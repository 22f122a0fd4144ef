/**
 * Shared test data builders
 */

import type {
  AnalysisPayloadInput,
  AnalysisRecord,
  ChannelRecord,
  VideoRecord,
} from '../../src/schemas/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Publish time of video 0; video i is published i days later */
export const VIDEO_EPOCH = Date.parse('2020-01-01T00:00:00.000Z');

export const TEST_CHANNEL_ID = 'UCtestchannel00000000001';

export const VALID_SUMMARY =
  'A hands-on woodworking channel that walks viewers through furniture builds, ' +
  'joinery techniques and shop organisation, with an emphasis on hand tools.';

export function createMockChannel(overrides: Partial<ChannelRecord> = {}): ChannelRecord {
  return {
    schemaVersion: 1,
    channelId: TEST_CHANNEL_ID,
    title: 'Test Workshop',
    description: 'Woodworking projects and tool reviews.',
    customUrl: '@testworkshop',
    country: 'US',
    publishedAt: '2015-03-01T00:00:00.000Z',
    thumbnailUrl: 'https://example.com/thumb.jpg',
    subscriberCount: 125_000,
    videoCount: 200,
    viewCount: 9_000_000,
    uploadsPlaylistId: 'UUtestchannel00000000001',
    fetchedAt: '2024-06-01T00:00:00.000Z',
    ...overrides,
  };
}

export function videoId(index: number): string {
  return `vid${String(index).padStart(4, '0')}`;
}

export function createMockVideo(index: number, overrides: Partial<VideoRecord> = {}): VideoRecord {
  return {
    schemaVersion: 1,
    videoId: videoId(index),
    channelId: TEST_CHANNEL_ID,
    title: `Build ${index}`,
    description: `Project number ${index}`,
    publishedAt: new Date(VIDEO_EPOCH + index * DAY_MS).toISOString(),
    thumbnailUrl: null,
    viewCount: 1_000 + index,
    likeCount: 10,
    commentCount: 1,
    duration: 'PT10M',
    tags: ['woodworking'],
    categoryId: '26',
    hasDetails: true,
    fetchedAt: '2024-06-01T00:00:00.000Z',
    ...overrides,
  };
}

/** `count` videos, index 0 oldest */
export function createMockVideos(count: number): VideoRecord[] {
  return Array.from({ length: count }, (_, i) => createMockVideo(i));
}

export function createMockAnalysis(overrides: Partial<AnalysisRecord> = {}): AnalysisRecord {
  return {
    schemaVersion: 1,
    channelId: TEST_CHANNEL_ID,
    summary: VALID_SUMMARY,
    themes: ['woodworking', 'joinery'],
    targetAudience: 'Hobbyist woodworkers',
    contentStyle: 'Long-form tutorials',
    uploadFrequency: 'Weekly',
    sampleVideoIds: [videoId(2), videoId(1), videoId(0)],
    samplingStrategy: 'all_videos',
    analyzedVideosCount: 3,
    totalVideosCount: 3,
    confidence: 0.8,
    analyzedAt: '2024-06-01T00:00:00.000Z',
    expiresAt: '2024-07-01T00:00:00.000Z',
    modelVersion: 'gemini-2.5-flash',
    degraded: false,
    ...overrides,
  };
}

export function createValidPayload(
  overrides: Partial<AnalysisPayloadInput> = {}
): AnalysisPayloadInput {
  return {
    summary: VALID_SUMMARY,
    themes: ['woodworking', 'joinery'],
    target_audience: 'Hobbyist woodworkers',
    content_style: 'Long-form tutorials',
    upload_frequency: 'Weekly',
    confidence_score: 0.8,
    ...overrides,
  };
}
