/**
 * Tests for analysis prompt assembly
 *
 * @module analysis/prompts.test
 */

import { describe, it, expect } from '@jest/globals';
import { createMockChannel, createMockVideo } from '../../tests/helpers/fixtures.js';
import { buildAnalysisPrompt } from './prompts.js';

describe('buildAnalysisPrompt', () => {
  it('should encode the channel attributes', () => {
    const prompt = buildAnalysisPrompt(createMockChannel(), []);

    expect(prompt.startsWith(
      [
        'Channel Information:',
        '- Title: Test Workshop',
        '- Description: Woodworking projects and tool reviews.',
        '- Subscriber Count: 125,000',
        '- Total Videos: 200',
        '- Active Since: 2015-03-01T00:00:00.000Z',
        '- Country: US',
      ].join('\n')
    )).toBe(true);
  });

  it('should encode each sampled video in sample order', () => {
    const prompt = buildAnalysisPrompt(createMockChannel(), [createMockVideo(1), createMockVideo(0)]);

    expect(prompt).toContain(
      [
        'Video 1:',
        '- Title: Build 1',
        '- Description: Project number 1',
        '- Views: 1,001',
        '- Likes: 10',
        '- Published: 2020-01-02T00:00:00.000Z',
        '- Duration: 10:00',
        '- Tags: woodworking',
      ].join('\n')
    );
    expect(prompt).toContain('Video Sample (2 representative videos):');
    expect(prompt.indexOf('- Title: Build 1')).toBeLessThan(prompt.indexOf('- Title: Build 0'));
  });

  it('should end with the JSON instruction block', () => {
    const prompt = buildAnalysisPrompt(createMockChannel(), [createMockVideo(0)]);

    expect(prompt).toContain('"confidence_score": 0.0');
    expect(prompt).toContain('"upload_frequency"');
    expect(prompt.endsWith('Return ONLY the JSON object, with no text before or after it')).toBe(
      true
    );
  });

  it('should bound descriptions and tags', () => {
    const channel = createMockChannel({ description: 'c'.repeat(600) });
    const video = createMockVideo(0, {
      description: 'v'.repeat(300),
      tags: ['a', 'b', 'c', 'd', 'e', 'f'],
    });

    const prompt = buildAnalysisPrompt(channel, [video]);

    expect(prompt).toContain(`- Description: ${'c'.repeat(500)}\n`);
    expect(prompt).not.toContain('c'.repeat(501));
    expect(prompt).toContain(`- Description: ${'v'.repeat(200)}\n`);
    expect(prompt).toContain('- Tags: a, b, c, d, e\n');
  });

  it('should mark missing details as unknown', () => {
    const video = createMockVideo(0, {
      viewCount: null,
      likeCount: null,
      duration: null,
      tags: [],
      hasDetails: false,
    });

    const prompt = buildAnalysisPrompt(createMockChannel({ country: null }), [video]);

    expect(prompt).toContain('- Country: Unknown');
    expect(prompt).toContain('- Views: unknown\n- Likes: unknown');
    expect(prompt).toContain('- Duration: Unknown\n- Tags: none');
  });

  it('should be deterministic', () => {
    const videos = [createMockVideo(3), createMockVideo(2)];
    expect(buildAnalysisPrompt(createMockChannel(), videos)).toBe(
      buildAnalysisPrompt(createMockChannel(), videos)
    );
  });
});
