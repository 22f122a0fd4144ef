/**
 * Analysis Formatter
 *
 * Terminal rendering of an AnalysisResult.
 *
 * @module cli/formatters/analysis
 */

import chalk from 'chalk';
import type { AnalysisResult, Freshness } from '../../schemas/index.js';

const FRESHNESS_LABELS: Record<Freshness, string> = {
  cached: 'from cache',
  stored: 'from store',
  stale: 'stale, refresh started',
  new: 'newly computed',
};

/**
 * Render an analysis as terminal lines.
 *
 * @example
 * ```
 * Test Workshop (UCtestchannel00000000001)
 * 125,000 subscribers, 200 videos
 *
 * Summary
 * A hands-on woodworking channel ...
 *
 * Themes:           woodworking, joinery
 * Audience:         Hobbyist woodworkers
 * Style:            Long-form tutorials
 * Upload frequency: Weekly
 *
 * Analyzed 3 of 3 videos (all_videos), confidence 80%
 * Analyzed 2024-06-01, expires 2024-07-01 (fresh, from cache)
 * Model: gemini-2.5-flash
 * ```
 */
export function formatAnalysisResult(
  result: AnalysisResult,
  paint: chalk.Chalk = chalk
): string {
  const { channel, analysis, meta } = result;
  const lines: string[] = [];

  lines.push(paint.bold(channel.title ? `${channel.title} (${channel.id})` : channel.id));
  if (channel.subscriberCount !== null && channel.videoCount !== null) {
    lines.push(
      paint.dim(
        `${formatNumber(channel.subscriberCount)} subscribers, ${formatNumber(channel.videoCount)} videos`
      )
    );
  }
  if (meta.degraded) {
    lines.push(paint.yellow('Metadata-only overview: AI analysis was unavailable'));
  }
  lines.push('');

  lines.push(paint.bold('Summary'));
  lines.push(analysis.summary);
  lines.push('');

  lines.push(field(paint, 'Themes', analysis.themes.length > 0 ? analysis.themes.join(', ') : 'none'));
  lines.push(field(paint, 'Audience', analysis.targetAudience || 'unknown'));
  lines.push(field(paint, 'Style', analysis.contentStyle || 'unknown'));
  lines.push(field(paint, 'Upload frequency', analysis.uploadFrequency));
  lines.push('');

  lines.push(
    paint.dim(
      `Analyzed ${meta.videosAnalyzed} of ${formatNumber(meta.totalVideos)} videos (${meta.samplingStrategy}), confidence ${Math.round(meta.confidence * 100)}%`
    )
  );
  lines.push(
    paint.dim(
      `Analyzed ${meta.analyzedAt.slice(0, 10)}, expires ${meta.expiresAt.slice(0, 10)} (${meta.age}, ${FRESHNESS_LABELS[meta.freshness]})`
    )
  );
  lines.push(paint.dim(`Model: ${meta.modelVersion}`));

  return lines.join('\n');
}

function field(paint: chalk.Chalk, label: string, value: string): string {
  return `${paint.dim(`${label}:`.padEnd(18))}${value}`;
}

function formatNumber(num: number): string {
  return num.toLocaleString('en-US');
}
