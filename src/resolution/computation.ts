/**
 * Analysis Computation
 *
 * One fresh analysis, start to finish: channel metadata, video list,
 * sample, details, prompt, generation. Metadata failures abort before any
 * generative spend. Nothing here writes to the store; the engine persists
 * the result.
 *
 * @module resolution/computation
 */

import { z } from 'zod';
import {
  AnalysisGenerator,
  buildAnalysisPrompt,
  buildAnalysisRecord,
  buildDegradedAnalysis,
  type AnalysisContext,
} from '../analysis/index.js';
import {
  AnalysisValidationError,
  isProviderError,
  isQuotaExceededError,
} from '../errors/index.js';
import { describeError, type Logger } from '../logging/index.js';
import type { MetadataFetcher } from '../metadata/index.js';
import type { QuotaLedger } from '../quota/index.js';
import { sampleVideos } from '../sampling/index.js';
import {
  ChannelRecordSchema,
  VideoRecordSchema,
  type AnalysisRecord,
  type ChannelRecord,
  type VideoRecord,
} from '../schemas/index.js';
import { cacheKey, type FastCache } from '../storage/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ComputationOptions {
  fetcher: MetadataFetcher;
  generator: AnalysisGenerator;
  ledger: QuotaLedger;
  /** Consulted for channel metadata and video lists before the provider */
  cache?: FastCache;
  maxSampleSize: number;
  stalenessWindowMs: number;
  /** Fall back to a metadata-only record when generation fails */
  degradedMode: boolean;
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Outcome of one computation, not yet persisted
 */
export interface ComputedAnalysis {
  record: AnalysisRecord;
  channel: ChannelRecord;
  /** Every known video, sample entries enriched with details */
  videos: VideoRecord[];
  /** Which inputs came from the fast cache instead of the provider */
  cached: { channel: boolean; videos: boolean };
}

const VideoListSchema = z.array(VideoRecordSchema);

// ============================================================================
// AnalysisComputation Class
// ============================================================================

export class AnalysisComputation {
  private readonly options: ComputationOptions;
  private readonly clock: () => Date;
  private readonly logger?: Logger;

  constructor(options: ComputationOptions) {
    this.options = options;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger;
  }

  /**
   * @throws QuotaExceededError, ChannelNotFoundError or ProviderError from
   *   the metadata stage; generation failures too when degraded mode is off
   */
  async compute(channelId: string): Promise<ComputedAnalysis> {
    const { fetcher } = this.options;

    const cachedChannel = await this.readCache(cacheKey('channel_meta', channelId), ChannelRecordSchema);
    const channel = cachedChannel ?? (await fetcher.fetchChannel(channelId));

    const cachedVideos = await this.readCache(
      cacheKey('video_list', channel.uploadsPlaylistId),
      VideoListSchema
    );
    const listed =
      cachedVideos ?? (await fetcher.fetchAllVideos(channelId, channel.uploadsPlaylistId));

    const { videos: picked, strategy } = sampleVideos(listed, this.options.maxSampleSize);
    const sample = await this.enrich(picked);
    const videos = mergeInto(listed, sample);

    this.logger?.debug(
      `[compute] ${channelId}: ${listed.length} video(s) known, ${sample.length} sampled (${strategy})`
    );

    const record = await this.analyze(channel, sample, videos, strategy);
    return {
      record,
      channel,
      videos,
      cached: { channel: cachedChannel !== null, videos: cachedVideos !== null },
    };
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private async analyze(
    channel: ChannelRecord,
    sample: VideoRecord[],
    videos: VideoRecord[],
    strategy: AnalysisContext['strategy']
  ): Promise<AnalysisRecord> {
    const context = (): AnalysisContext => ({
      channel,
      sample,
      strategy,
      analyzedAt: this.clock(),
      stalenessWindowMs: this.options.stalenessWindowMs,
    });

    if (sample.length === 0) {
      this.logger?.info(`[compute] ${channel.channelId} has no public videos; skipping generation`);
      return buildDegradedAnalysis(context(), videos);
    }

    const reservation = this.options.ledger.reserveGeneration();
    if (!reservation.ok) {
      if (!this.options.degradedMode) {
        throw reservation.error;
      }
      this.logger?.warn(`[compute] ${reservation.error.message}; returning metadata-only analysis`);
      return buildDegradedAnalysis(context(), videos);
    }

    const prompt = buildAnalysisPrompt(channel, sample);
    try {
      const generated = await this.options.generator.generate(prompt);
      return buildAnalysisRecord(generated.payload, generated.modelId, context());
    } catch (error) {
      const degradable =
        (isProviderError(error) || error instanceof AnalysisValidationError) &&
        !isQuotaExceededError(error);
      if (!this.options.degradedMode || !degradable) {
        throw error;
      }
      this.logger?.warn(
        `[compute] Generation failed for ${channel.channelId} (${describeError(error)}); returning metadata-only analysis`
      );
      return buildDegradedAnalysis(context(), videos);
    }
  }

  /**
   * Fetch details for sampled videos that lack them, keeping sample order
   */
  private async enrich(sample: VideoRecord[]): Promise<VideoRecord[]> {
    const missing = sample.filter((video) => !video.hasDetails);
    if (missing.length === 0) {
      return sample;
    }
    const enriched = await this.options.fetcher.fetchVideoDetails(missing);
    return mergeInto(sample, enriched);
  }

  private async readCache<T extends z.ZodTypeAny>(
    key: string,
    schema: T
  ): Promise<z.output<T> | null> {
    const cache = this.options.cache;
    if (!cache) {
      return null;
    }
    let value: unknown;
    try {
      value = await cache.get(key);
    } catch (error) {
      this.logger?.warn(`[compute] Cache read failed for ${key}: ${describeError(error)}`);
      return null;
    }
    if (value === undefined) {
      return null;
    }
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      this.logger?.debug(`[compute] Ignoring malformed cache entry ${key}`);
      return null;
    }
    return parsed.data;
  }
}

/**
 * Replace entries of `videos` by id with their counterparts in `updates`
 */
function mergeInto(videos: VideoRecord[], updates: VideoRecord[]): VideoRecord[] {
  if (updates.length === 0) {
    return videos;
  }
  const byId = new Map(updates.map((video) => [video.videoId, video]));
  return videos.map((video) => byId.get(video.videoId) ?? video);
}
