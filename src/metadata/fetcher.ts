/**
 * Metadata Fetcher
 *
 * Wraps a YouTubeApi client with quota accounting, bounded retry and
 * record conversion. Every provider call reserves its quota cost first; a
 * refused reservation fails fast with QuotaExceededError and the provider
 * is never contacted.
 *
 * @module metadata/fetcher
 */

import type { QuotaOperation } from '../config/costs.js';
import {
  ChannelNotFoundError,
  isProviderError,
  isQuotaExceededError,
  isRetryableError,
} from '../errors/index.js';
import { describeError, type Logger } from '../logging/index.js';
import type { QuotaLedger } from '../quota/index.js';
import { withRetry } from '../resilience/index.js';
import type { ChannelRecord, VideoRecord } from '../schemas/index.js';
import { SCHEMA_VERSIONS } from '../schemas/index.js';
import {
  MAX_BATCH_SIZE,
  type ChannelReference,
  type PlaylistPage,
  type PlaylistVideo,
  type VideoDetails,
  type YouTubeApi,
  type YouTubeChannel,
} from '../youtube/index.js';

// ============================================================================
// Types
// ============================================================================

export interface MetadataFetcherOptions {
  client: YouTubeApi;
  ledger: QuotaLedger;
  /** Upper bound on playlist pages per channel (default: 10) */
  maxPages?: number;
  /** Base delay before the single retry of a failed call (default: 1000) */
  retryBaseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
  logger?: Logger;
}

const DEFAULTS = {
  maxPages: 10,
  retryBaseDelayMs: 1000,
} as const;

/** One retry after the first failure */
const CALL_ATTEMPTS = 2;

// ============================================================================
// MetadataFetcher Class
// ============================================================================

/**
 * @example
 * ```typescript
 * const fetcher = new MetadataFetcher({ client: new YouTubeClient(), ledger });
 *
 * const channel = await fetcher.fetchChannel('UC...');
 * const videos = await fetcher.fetchAllVideos(channel.channelId, channel.uploadsPlaylistId);
 * const enriched = await fetcher.fetchVideoDetails(videos.slice(0, 50));
 * ```
 */
export class MetadataFetcher {
  private readonly client: YouTubeApi;
  private readonly ledger: QuotaLedger;
  private readonly maxPages: number;
  private readonly retryBaseDelayMs: number;
  private readonly sleep?: (ms: number) => Promise<void>;
  private readonly clock: () => Date;
  private readonly logger?: Logger;

  constructor(options: MetadataFetcherOptions) {
    this.client = options.client;
    this.ledger = options.ledger;
    this.maxPages = options.maxPages ?? DEFAULTS.maxPages;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? DEFAULTS.retryBaseDelayMs;
    this.sleep = options.sleep;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger;
  }

  // ==========================================================================
  // Channels
  // ==========================================================================

  /**
   * Turn a parsed reference into a channel id.
   *
   * Raw ids cost nothing; handles and usernames cost one channels.list
   * call; custom names need a search.list call (100 units).
   *
   * @throws ChannelNotFoundError when nothing matches
   */
  async resolveChannelId(reference: ChannelReference): Promise<string> {
    switch (reference.kind) {
      case 'id':
        return reference.value;
      case 'handle': {
        const channel = await this.call('channels', () =>
          this.client.getChannelByHandle(reference.value)
        );
        return requireFound(channel, `@${reference.value}`).channelId;
      }
      case 'username': {
        const channel = await this.call('channels', () =>
          this.client.getChannelByUsername(reference.value)
        );
        return requireFound(channel, reference.value).channelId;
      }
      case 'custom': {
        const channelId = await this.call('search', () =>
          this.client.searchChannelId(reference.value)
        );
        return requireFound(channelId, reference.value);
      }
    }
  }

  /**
   * @throws ChannelNotFoundError when the provider knows no such channel
   */
  async fetchChannel(channelId: string): Promise<ChannelRecord> {
    let channel: YouTubeChannel | null;
    try {
      channel = await this.call('channels', () => this.client.getChannel(channelId));
    } catch (error) {
      if (isProviderError(error) && error.statusCode === 404) {
        throw new ChannelNotFoundError(channelId);
      }
      throw error;
    }
    const found = requireFound(channel, channelId);

    this.logger?.debug(`[metadata] Fetched channel ${channelId} (${found.videoCount} videos)`);
    return {
      schemaVersion: SCHEMA_VERSIONS.channel,
      ...found,
      fetchedAt: this.clock().toISOString(),
    };
  }

  // ==========================================================================
  // Videos
  // ==========================================================================

  /**
   * Enumerate the uploads playlist, metadata only.
   *
   * Stops when the provider reports no further page or after `maxPages`
   * pages; hitting the page cap truncates the list without error. A
   * missing playlist (404) means the channel has no public uploads.
   */
  async fetchAllVideos(channelId: string, uploadsPlaylistId: string): Promise<VideoRecord[]> {
    const seen = new Set<string>();
    const videos: VideoRecord[] = [];
    const fetchedAt = this.clock().toISOString();
    let pageToken: string | undefined;
    let pages = 0;

    do {
      let page: PlaylistPage;
      try {
        const token = pageToken;
        page = await this.call('playlistItems', () =>
          this.client.listPlaylistItems(uploadsPlaylistId, token)
        );
      } catch (error) {
        if (pages === 0 && isProviderError(error) && error.statusCode === 404) {
          this.logger?.debug(`[metadata] Uploads playlist ${uploadsPlaylistId} not found`);
          return [];
        }
        throw error;
      }
      pages++;

      for (const item of page.items) {
        if (seen.has(item.videoId)) {
          continue;
        }
        seen.add(item.videoId);
        videos.push(fromPlaylistItem(item, channelId, fetchedAt));
      }
      pageToken = page.nextPageToken ?? undefined;
    } while (pageToken && pages < this.maxPages);

    if (pageToken) {
      this.logger?.debug(
        `[metadata] Stopped after ${pages} page(s) for ${channelId}; list truncated at ${videos.length}`
      );
    }
    return videos;
  }

  /**
   * Enrich videos with statistics and content details, 50 per call.
   *
   * A failed batch is retried once; if it fails again its videos are
   * returned unchanged with `hasDetails: false`. Quota exhaustion is not a
   * partial failure and propagates.
   */
  async fetchVideoDetails(videos: VideoRecord[]): Promise<VideoRecord[]> {
    const result: VideoRecord[] = [];

    for (let i = 0; i < videos.length; i += MAX_BATCH_SIZE) {
      const batch = videos.slice(i, i + MAX_BATCH_SIZE);
      const ids = batch.map((video) => video.videoId);

      let details: VideoDetails[];
      try {
        details = await this.call(
          'videos',
          () => this.client.getVideoDetails(ids),
          (error) => !isQuotaExceededError(error)
        );
      } catch (error) {
        if (isQuotaExceededError(error)) {
          throw error;
        }
        this.logger?.warn(
          `[metadata] Details unavailable for ${batch.length} video(s): ${describeError(error)}`
        );
        result.push(...batch.map((video) => ({ ...video, hasDetails: false })));
        continue;
      }

      const byId = new Map(details.map((detail) => [detail.videoId, detail]));
      const fetchedAt = this.clock().toISOString();
      for (const video of batch) {
        const detail = byId.get(video.videoId);
        result.push(detail ? withDetails(video, detail, fetchedAt) : video);
      }
    }

    return result;
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  /**
   * Reserve quota, then call the provider. Each attempt reserves again:
   * a retried call costs the provider's quota a second time.
   */
  private async call<T>(
    operation: QuotaOperation,
    fn: () => Promise<T>,
    shouldRetry: (error: unknown) => boolean = isRetryableError
  ): Promise<T> {
    return withRetry(
      async () => {
        const reservation = this.ledger.reserveCall(operation);
        if (!reservation.ok) {
          throw reservation.error;
        }
        return fn();
      },
      {
        maxAttempts: CALL_ATTEMPTS,
        baseDelayMs: this.retryBaseDelayMs,
        sleep: this.sleep,
        shouldRetry,
        onRetry: (error, attempt, delayMs) => {
          this.logger?.debug(
            `[metadata] ${operation} attempt ${attempt} failed (${describeError(error)}), retrying in ${Math.round(delayMs)}ms`
          );
        },
      }
    );
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

function requireFound<T>(value: T | null, reference: string): T {
  if (value === null) {
    throw new ChannelNotFoundError(reference);
  }
  return value;
}

function fromPlaylistItem(item: PlaylistVideo, channelId: string, fetchedAt: string): VideoRecord {
  return {
    schemaVersion: SCHEMA_VERSIONS.video,
    videoId: item.videoId,
    channelId: item.channelId || channelId,
    title: item.title,
    description: item.description,
    publishedAt: item.publishedAt,
    thumbnailUrl: item.thumbnailUrl,
    viewCount: null,
    likeCount: null,
    commentCount: null,
    duration: null,
    tags: [],
    categoryId: null,
    hasDetails: false,
    fetchedAt,
  };
}

function withDetails(video: VideoRecord, detail: VideoDetails, fetchedAt: string): VideoRecord {
  return {
    ...video,
    title: detail.title,
    description: detail.description,
    publishedAt: detail.publishedAt,
    thumbnailUrl: detail.thumbnailUrl ?? video.thumbnailUrl,
    viewCount: detail.viewCount,
    likeCount: detail.likeCount,
    commentCount: detail.commentCount,
    duration: detail.duration,
    tags: detail.tags,
    categoryId: detail.categoryId,
    hasDetails: true,
    fetchedAt,
  };
}
