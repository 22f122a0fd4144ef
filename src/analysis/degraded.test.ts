/**
 * Tests for degraded (metadata-only) analysis
 *
 * @module analysis/degraded.test
 */

import { describe, it, expect } from '@jest/globals';
import { AnalysisRecordSchema } from '../schemas/index.js';
import {
  createMockChannel,
  createMockVideo,
  createMockVideos,
} from '../../tests/helpers/fixtures.js';
import { buildDegradedAnalysis, estimateUploadFrequency, topTags } from './degraded.js';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('buildDegradedAnalysis', () => {
  it('should build a valid metadata-only record', () => {
    const sample = [createMockVideo(2), createMockVideo(1), createMockVideo(0)];

    const record = buildDegradedAnalysis({
      channel: createMockChannel(),
      sample,
      strategy: 'all_videos',
      analyzedAt: new Date('2024-06-01T00:00:00.000Z'),
      stalenessWindowMs: 30 * DAY_MS,
    });

    expect(record).toEqual({
      schemaVersion: 1,
      channelId: 'UCtestchannel00000000001',
      summary:
        'Test Workshop is a YouTube channel with 125,000 subscribers and 200 videos. ' +
        'Woodworking projects and tool reviews. ' +
        'This overview was built from channel metadata and 3 sampled video(s) without AI analysis.',
      themes: ['woodworking'],
      targetAudience: '',
      contentStyle: '',
      uploadFrequency: 'daily',
      sampleVideoIds: ['vid0002', 'vid0001', 'vid0000'],
      samplingStrategy: 'all_videos',
      analyzedVideosCount: 3,
      totalVideosCount: 200,
      confidence: 0.2,
      analyzedAt: '2024-06-01T00:00:00.000Z',
      expiresAt: '2024-07-01T00:00:00.000Z',
      modelVersion: 'metadata-only',
      degraded: true,
    });
    expect(AnalysisRecordSchema.safeParse(record).success).toBe(true);
  });

  it('should estimate cadence from all known videos when given', () => {
    const weekly = [0, 1, 2, 3].map((week) => createMockVideo(week * 7));

    const record = buildDegradedAnalysis(
      {
        channel: createMockChannel({ description: '' }),
        sample: weekly.slice(0, 1),
        strategy: 'all_videos',
        analyzedAt: new Date('2024-06-01T00:00:00.000Z'),
        stalenessWindowMs: DAY_MS,
      },
      weekly
    );

    expect(record.uploadFrequency).toBe('weekly');
    expect(record.summary).toBe(
      'Test Workshop is a YouTube channel with 125,000 subscribers and 200 videos. ' +
        'This overview was built from channel metadata and 1 sampled video(s) without AI analysis.'
    );
  });
});

describe('topTags', () => {
  it('should rank tags by frequency with alphabetical ties', () => {
    const videos = [
      createMockVideo(0, { tags: ['Joinery', 'woodworking'] }),
      createMockVideo(1, { tags: ['woodworking', 'finishing'] }),
      createMockVideo(2, { tags: ['joinery', ' JOINERY '] }),
    ];

    expect(topTags(videos, 5)).toEqual(['joinery', 'woodworking', 'finishing']);
    expect(topTags(videos, 1)).toEqual(['joinery']);
  });
});

describe('estimateUploadFrequency', () => {
  it('should classify by the median gap between uploads', () => {
    expect(estimateUploadFrequency(createMockVideos(5))).toBe('daily');
    expect(estimateUploadFrequency([0, 3, 6].map((day) => createMockVideo(day)))).toBe(
      '2-3 times per week'
    );
    expect(estimateUploadFrequency([0, 30, 60].map((day) => createMockVideo(day)))).toBe(
      'monthly'
    );
    expect(estimateUploadFrequency([0, 100, 200].map((day) => createMockVideo(day)))).toBe(
      'irregular'
    );
  });

  it('should use the median so one long break does not dominate', () => {
    const videos = [0, 1, 2, 32].map((day) => createMockVideo(day));
    expect(estimateUploadFrequency(videos)).toBe('daily');
  });

  it('should report unknown with fewer than two videos', () => {
    expect(estimateUploadFrequency([createMockVideo(0)])).toBe('unknown');
    expect(estimateUploadFrequency([])).toBe('unknown');
  });
});
