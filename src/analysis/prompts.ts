/**
 * Analysis Prompts
 *
 * Prompt template for channel analysis. Building a prompt is pure: the
 * same channel and sample always produce the same text, so the sample ids
 * stored on a record are enough to reproduce what the model saw.
 *
 * @module analysis/prompts
 */

import type { ChannelRecord, VideoRecord } from '../schemas/index.js';
import { formatDuration, parseDuration } from '../youtube/index.js';

// ============================================================================
// Limits
// ============================================================================

export const PROMPT_LIMITS = {
  channelDescription: 500,
  videoTitle: 150,
  videoDescription: 200,
  tagsPerVideo: 5,
} as const;

// ============================================================================
// System Prompt
// ============================================================================

/**
 * System instruction sent with every analysis request
 */
export const ANALYSIS_SYSTEM_PROMPT = `You are a YouTube analytics expert. Analyze channel data and provide factual, concise insights in valid JSON format.

Base every statement on the channel and video data you are given. Do not guess at facts the data does not show.`;

// ============================================================================
// Instruction Block
// ============================================================================

const OUTPUT_INSTRUCTIONS = `Based on the channel and video data above, return a JSON object with exactly these fields:

{
  "summary": "Three short paragraphs: what the channel is about, its main focus, and what viewers get from it (at least 100 characters)",
  "themes": ["specific topic", "another topic", "..."],
  "target_audience": "Who the channel is primarily made for",
  "content_style": "Format, tone and presentation approach",
  "upload_frequency": "Estimated cadence, e.g. 'daily', '2-3 times per week', 'weekly', 'irregular'",
  "confidence_score": 0.0
}

Guidelines:
1. Use only the data provided above
2. Themes are specific subjects the videos cover, not generic genres
3. confidence_score is a number from 0.0 to 1.0 reflecting how much the data supports your analysis
4. Return ONLY the JSON object, with no text before or after it`;

// ============================================================================
// Prompt Builder
// ============================================================================

/**
 * Build the user prompt for a channel and its video sample.
 *
 * @param videos - Sampled videos in sample order
 *
 * @example
 * ```typescript
 * const { videos: sample } = sampleVideos(allVideos);
 * const prompt = buildAnalysisPrompt(channel, sample);
 * ```
 */
export function buildAnalysisPrompt(channel: ChannelRecord, videos: VideoRecord[]): string {
  const channelSection = [
    'Channel Information:',
    `- Title: ${channel.title}`,
    `- Description: ${truncate(channel.description, PROMPT_LIMITS.channelDescription) || 'N/A'}`,
    `- Subscriber Count: ${formatCount(channel.subscriberCount)}`,
    `- Total Videos: ${formatCount(channel.videoCount)}`,
    `- Active Since: ${channel.publishedAt ?? 'Unknown'}`,
    `- Country: ${channel.country ?? 'Unknown'}`,
  ].join('\n');

  const videoSection = videos
    .map((video, index) =>
      [
        `Video ${index + 1}:`,
        `- Title: ${truncate(video.title, PROMPT_LIMITS.videoTitle)}`,
        `- Description: ${truncate(video.description, PROMPT_LIMITS.videoDescription) || 'N/A'}`,
        `- Views: ${formatCount(video.viewCount)}`,
        `- Likes: ${formatCount(video.likeCount)}`,
        `- Published: ${video.publishedAt}`,
        `- Duration: ${describeDuration(video.duration)}`,
        `- Tags: ${video.tags.slice(0, PROMPT_LIMITS.tagsPerVideo).join(', ') || 'none'}`,
      ].join('\n')
    )
    .join('\n\n');

  return [
    channelSection,
    `Video Sample (${videos.length} representative videos):`,
    videoSection,
    OUTPUT_INSTRUCTIONS,
  ]
    .filter((section) => section.length > 0)
    .join('\n\n');
}

// ============================================================================
// Helper Functions
// ============================================================================

function truncate(text: string, maxLength: number): string {
  const clean = text.replace(/\s+/g, ' ').trim();
  return clean.length > maxLength ? clean.slice(0, maxLength) : clean;
}

function formatCount(value: number | null): string {
  return value === null ? 'unknown' : value.toLocaleString('en-US');
}

function describeDuration(duration: string | null): string {
  if (!duration) {
    return 'Unknown';
  }
  const seconds = parseDuration(duration);
  return seconds > 0 ? formatDuration(seconds) : 'Unknown';
}
