/**
 * YouTube Data API Client
 *
 * Low-level client for the YouTube Data API v3: channel lookup (by id,
 * handle, legacy username or search), uploads playlist pagination and
 * batched video details. Responses are validated with zod; HTTP failures
 * are classified into the typed errors of `errors/`.
 *
 * The client does not account quota itself: callers reserve units on the
 * QuotaLedger before each call.
 *
 * @module youtube/client
 */

import { z } from 'zod';
import { requireApiKey } from '../config/index.js';
import { ProviderError, ProviderTimeoutError, QuotaExceededError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export interface YouTubeClientOptions {
  /** API key (default: YOUTUBE_API_KEY) */
  apiKey?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
  baseUrl?: string;
}

/**
 * Channel attributes from channels.list
 */
export interface YouTubeChannel {
  channelId: string;
  title: string;
  description: string;
  customUrl: string | null;
  country: string | null;
  publishedAt: string | null;
  thumbnailUrl: string | null;
  subscriberCount: number;
  videoCount: number;
  viewCount: number;
  uploadsPlaylistId: string;
}

/**
 * Upload entry from playlistItems.list
 */
export interface PlaylistVideo {
  videoId: string;
  channelId: string;
  title: string;
  description: string;
  /** Video publish time (falls back to the time it was added to the playlist) */
  publishedAt: string;
  thumbnailUrl: string | null;
}

export interface PlaylistPage {
  items: PlaylistVideo[];
  nextPageToken: string | null;
  totalResults: number | null;
}

/**
 * Detailed video information from videos.list
 */
export interface VideoDetails {
  videoId: string;
  channelId: string;
  title: string;
  description: string;
  publishedAt: string;
  thumbnailUrl: string | null;
  /** ISO8601 duration, e.g. "PT15M33S" */
  duration: string | null;
  /** null when the owner hides the statistic */
  viewCount: number | null;
  likeCount: number | null;
  commentCount: number | null;
  tags: string[];
  categoryId: string | null;
}

/**
 * Everything the metadata layer needs from a YouTube client
 */
export interface YouTubeApi {
  getChannel(channelId: string): Promise<YouTubeChannel | null>;
  getChannelByHandle(handle: string): Promise<YouTubeChannel | null>;
  getChannelByUsername(username: string): Promise<YouTubeChannel | null>;
  searchChannelId(query: string): Promise<string | null>;
  listPlaylistItems(playlistId: string, pageToken?: string): Promise<PlaylistPage>;
  getVideoDetails(videoIds: string[]): Promise<VideoDetails[]>;
}

// ============================================================================
// API Response Schemas (Internal)
// ============================================================================

const ThumbnailsSchema = z
  .object({
    default: z.object({ url: z.string() }).optional(),
    medium: z.object({ url: z.string() }).optional(),
    high: z.object({ url: z.string() }).optional(),
  })
  .optional();

const CountSchema = z.union([z.string(), z.number()]).optional();

const ChannelsResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: z.object({
          title: z.string(),
          description: z.string().default(''),
          customUrl: z.string().optional(),
          country: z.string().optional(),
          publishedAt: z.string().optional(),
          thumbnails: ThumbnailsSchema,
        }),
        statistics: z
          .object({
            subscriberCount: CountSchema,
            videoCount: CountSchema,
            viewCount: CountSchema,
          })
          .optional(),
        contentDetails: z
          .object({
            relatedPlaylists: z.object({ uploads: z.string().optional() }).optional(),
          })
          .optional(),
      })
    )
    .default([]),
});

const PlaylistItemsResponseSchema = z.object({
  nextPageToken: z.string().optional(),
  pageInfo: z.object({ totalResults: z.number().optional() }).optional(),
  items: z
    .array(
      z.object({
        snippet: z.object({
          publishedAt: z.string(),
          channelId: z.string().optional(),
          videoOwnerChannelId: z.string().optional(),
          title: z.string(),
          description: z.string().default(''),
          thumbnails: ThumbnailsSchema,
          resourceId: z.object({ videoId: z.string().optional() }).optional(),
        }),
        contentDetails: z
          .object({
            videoId: z.string().optional(),
            videoPublishedAt: z.string().optional(),
          })
          .optional(),
      })
    )
    .default([]),
});

const VideosResponseSchema = z.object({
  items: z
    .array(
      z.object({
        id: z.string(),
        snippet: z.object({
          publishedAt: z.string(),
          channelId: z.string(),
          title: z.string(),
          description: z.string().default(''),
          thumbnails: ThumbnailsSchema,
          tags: z.array(z.string()).optional(),
          categoryId: z.string().optional(),
        }),
        contentDetails: z.object({ duration: z.string().optional() }).optional(),
        statistics: z
          .object({
            viewCount: CountSchema,
            likeCount: CountSchema,
            commentCount: CountSchema,
          })
          .optional(),
      })
    )
    .default([]),
});

const SearchResponseSchema = z.object({
  items: z
    .array(z.object({ id: z.object({ kind: z.string(), channelId: z.string().optional() }) }))
    .default([]),
});

const ErrorBodySchema = z.object({
  error: z
    .object({
      message: z.string().optional(),
      errors: z.array(z.object({ reason: z.string().optional() })).optional(),
    })
    .optional(),
});

// ============================================================================
// Constants
// ============================================================================

const DEFAULTS = {
  timeoutMs: 10000,
  baseUrl: 'https://www.googleapis.com/youtube/v3',
} as const;

/** Provider limit for ids per videos.list call and items per page */
export const MAX_BATCH_SIZE = 50;

const DAY_MS = 24 * 60 * 60 * 1000;

const QUOTA_REASONS = new Set(['quotaExceeded', 'dailyLimitExceeded']);
const RATE_LIMIT_REASONS = new Set(['rateLimitExceeded', 'userRateLimitExceeded']);

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * @example
 * ```typescript
 * const client = new YouTubeClient();
 *
 * const channel = await client.getChannelByHandle('@somecreator');
 * const page = await client.listPlaylistItems(channel.uploadsPlaylistId);
 * const details = await client.getVideoDetails(page.items.map((v) => v.videoId));
 * ```
 */
export class YouTubeClient implements YouTubeApi {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly baseUrl: string;

  /**
   * @throws Error if no API key is passed and YOUTUBE_API_KEY is not set
   */
  constructor(options: YouTubeClientOptions = {}) {
    this.apiKey = options.apiKey ?? requireApiKey('youtube');
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    this.fetchFn = options.fetch ?? fetch;
    this.baseUrl = options.baseUrl ?? DEFAULTS.baseUrl;
  }

  /**
   * Look up a channel by id. Costs 1 quota unit.
   *
   * @returns null when the channel does not exist
   */
  async getChannel(channelId: string): Promise<YouTubeChannel | null> {
    return this.fetchChannel({ id: channelId });
  }

  /**
   * Look up a channel by @handle. Costs 1 quota unit.
   */
  async getChannelByHandle(handle: string): Promise<YouTubeChannel | null> {
    return this.fetchChannel({ forHandle: handle.startsWith('@') ? handle : `@${handle}` });
  }

  /**
   * Look up a channel by legacy username. Costs 1 quota unit.
   */
  async getChannelByUsername(username: string): Promise<YouTubeChannel | null> {
    return this.fetchChannel({ forUsername: username });
  }

  /**
   * Best channel match for a free-text query. Costs 100 quota units.
   */
  async searchChannelId(query: string): Promise<string | null> {
    const data = await this.get(
      'search',
      { part: 'snippet', q: query, type: 'channel', maxResults: '1' },
      SearchResponseSchema
    );
    const match = data.items.find((item) => item.id.channelId);
    return match?.id.channelId ?? null;
  }

  /**
   * One page (up to 50 items) of a playlist. Costs 1 quota unit.
   */
  async listPlaylistItems(playlistId: string, pageToken?: string): Promise<PlaylistPage> {
    const params: Record<string, string> = {
      part: 'snippet,contentDetails',
      playlistId,
      maxResults: String(MAX_BATCH_SIZE),
    };
    if (pageToken) {
      params.pageToken = pageToken;
    }

    const data = await this.get('playlistItems', params, PlaylistItemsResponseSchema);
    const items: PlaylistVideo[] = [];
    for (const item of data.items) {
      const videoId = item.contentDetails?.videoId ?? item.snippet.resourceId?.videoId;
      if (!videoId) {
        continue;
      }
      items.push({
        videoId,
        channelId: item.snippet.videoOwnerChannelId ?? item.snippet.channelId ?? '',
        title: item.snippet.title,
        description: item.snippet.description,
        publishedAt: item.contentDetails?.videoPublishedAt ?? item.snippet.publishedAt,
        thumbnailUrl: pickThumbnail(item.snippet.thumbnails),
      });
    }

    return {
      items,
      nextPageToken: data.nextPageToken ?? null,
      totalResults: data.pageInfo?.totalResults ?? null,
    };
  }

  /**
   * Detailed information for up to 50 videos. Costs 1 quota unit
   * regardless of how many ids are requested.
   *
   * @throws Error if more than 50 ids are passed
   */
  async getVideoDetails(videoIds: string[]): Promise<VideoDetails[]> {
    if (videoIds.length === 0) {
      return [];
    }
    if (videoIds.length > MAX_BATCH_SIZE) {
      throw new Error(`videos.list accepts at most ${MAX_BATCH_SIZE} ids, got ${videoIds.length}`);
    }

    const data = await this.get(
      'videos',
      { part: 'snippet,contentDetails,statistics', id: videoIds.join(',') },
      VideosResponseSchema
    );

    return data.items.map((item) => ({
      videoId: item.id,
      channelId: item.snippet.channelId,
      title: item.snippet.title,
      description: item.snippet.description,
      publishedAt: item.snippet.publishedAt,
      thumbnailUrl: pickThumbnail(item.snippet.thumbnails),
      duration: item.contentDetails?.duration ?? null,
      viewCount: parseCount(item.statistics?.viewCount),
      likeCount: parseCount(item.statistics?.likeCount),
      commentCount: parseCount(item.statistics?.commentCount),
      tags: item.snippet.tags ?? [],
      categoryId: item.snippet.categoryId ?? null,
    }));
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private async fetchChannel(selector: Record<string, string>): Promise<YouTubeChannel | null> {
    const data = await this.get(
      'channels',
      { part: 'snippet,statistics,contentDetails', ...selector },
      ChannelsResponseSchema
    );
    const item = data.items[0];
    if (!item) {
      return null;
    }

    return {
      channelId: item.id,
      title: item.snippet.title,
      description: item.snippet.description,
      customUrl: item.snippet.customUrl ?? null,
      country: item.snippet.country ?? null,
      publishedAt: item.snippet.publishedAt ?? null,
      thumbnailUrl: pickThumbnail(item.snippet.thumbnails),
      subscriberCount: parseCount(item.statistics?.subscriberCount) ?? 0,
      videoCount: parseCount(item.statistics?.videoCount) ?? 0,
      viewCount: parseCount(item.statistics?.viewCount) ?? 0,
      uploadsPlaylistId:
        item.contentDetails?.relatedPlaylists?.uploads ?? deriveUploadsPlaylistId(item.id),
    };
  }

  private async get<T extends z.ZodTypeAny>(
    endpoint: string,
    params: Record<string, string>,
    schema: T
  ): Promise<z.output<T>> {
    const query = new URLSearchParams({ ...params, key: this.apiKey });
    const response = await this.fetchWithTimeout(`${this.baseUrl}/${endpoint}?${query.toString()}`);

    if (!response.ok) {
      await this.handleError(response, endpoint);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ProviderError(`Invalid JSON from ${endpoint}`, 'youtube', response.status, true, {
        cause: error,
      });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(
        `Unexpected ${endpoint} response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        'youtube',
        response.status,
        false,
        { cause: parsed.error }
      );
    }
    return parsed.data;
  }

  /**
   * Execute fetch with timeout using AbortController.
   */
  private async fetchWithTimeout(url: string): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.fetchFn(url, { method: 'GET', signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new ProviderTimeoutError('youtube', this.timeoutMs);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`YouTube request failed: ${message}`, 'youtube', 0, true, {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Classify an error response.
   *
   * 403 with a quota reason means the project's daily quota is gone: that
   * surfaces as QuotaExceededError and is never retried. Rate limits and
   * 5xx are retryable.
   */
  private async handleError(response: Response, endpoint: string): Promise<never> {
    const text = await response.text().catch(() => '');

    let errorMessage = text || response.statusText || 'Unknown error';
    let reasons: string[] = [];
    try {
      const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        errorMessage = parsed.data.error?.message ?? errorMessage;
        reasons = (parsed.data.error?.errors ?? [])
          .map((e) => e.reason)
          .filter((reason): reason is string => typeof reason === 'string');
      }
    } catch {
      // Keep raw text as error message
    }

    const lowerMessage = errorMessage.toLowerCase();
    const isQuotaExceeded =
      reasons.some((reason) => QUOTA_REASONS.has(reason)) ||
      (response.status === 403 &&
        (lowerMessage.includes('quota') || lowerMessage.includes('daily limit')));

    if (isQuotaExceeded) {
      throw new QuotaExceededError(
        `YouTube API quota exceeded: ${errorMessage}`,
        'youtube',
        0,
        0,
        msUntilNextUtcDay(Date.now())
      );
    }

    const isRateLimited =
      response.status === 429 || reasons.some((reason) => RATE_LIMIT_REASONS.has(reason));
    const isRetryable = isRateLimited || response.status >= 500;

    let message: string;
    if (isRateLimited) {
      message = `Rate limit exceeded: ${errorMessage}`;
    } else if (response.status >= 500) {
      message = `Server error (${response.status}): ${errorMessage}`;
    } else if (response.status === 401) {
      message = `Authentication failed: Invalid API key`;
    } else if (response.status === 403) {
      message = `Access forbidden: ${errorMessage}`;
    } else {
      message = `API error (${response.status}) from ${endpoint}: ${errorMessage}`;
    }

    throw new ProviderError(message, 'youtube', response.status, isRetryable);
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

function pickThumbnail(thumbnails: z.infer<typeof ThumbnailsSchema>): string | null {
  return thumbnails?.high?.url ?? thumbnails?.medium?.url ?? thumbnails?.default?.url ?? null;
}

function parseCount(value: string | number | undefined): number | null {
  if (value === undefined) {
    return null;
  }
  const parsed = typeof value === 'number' ? value : parseInt(value, 10);
  return Number.isFinite(parsed) && parsed >= 0 ? Math.floor(parsed) : null;
}

/**
 * Uploads playlist ids are the channel id with the "UC" prefix replaced
 * by "UU".
 */
export function deriveUploadsPlaylistId(channelId: string): string {
  return channelId.startsWith('UC') ? `UU${channelId.slice(2)}` : channelId;
}

function msUntilNextUtcDay(nowMs: number): number {
  return DAY_MS - (nowMs % DAY_MS);
}

/**
 * Parse ISO8601 duration to seconds.
 *
 * @example
 * parseDuration('PT15M33S') // 933
 * parseDuration('PT1H30M') // 5400
 */
export function parseDuration(duration: string): number {
  const match = duration.match(/^P(?:(\d+)D)?T?(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?$/);
  if (!match) {
    return 0;
  }

  const days = parseInt(match[1] ?? '0', 10);
  const hours = parseInt(match[2] ?? '0', 10);
  const minutes = parseInt(match[3] ?? '0', 10);
  const seconds = parseInt(match[4] ?? '0', 10);

  return days * 86400 + hours * 3600 + minutes * 60 + seconds;
}

/**
 * Format seconds as h:mm:ss or m:ss
 */
export function formatDuration(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const ss = String(seconds).padStart(2, '0');
  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, '0')}:${ss}`;
  }
  return `${minutes}:${ss}`;
}
