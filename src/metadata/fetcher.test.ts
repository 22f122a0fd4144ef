/**
 * Tests for MetadataFetcher
 *
 * @module metadata/fetcher.test
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  ChannelNotFoundError,
  ProviderError,
  QuotaExceededError,
} from '../errors/index.js';
import { QuotaLedger } from '../quota/index.js';
import { FakeYouTubeApi } from '../../tests/helpers/fake-youtube.js';
import { TEST_CHANNEL_ID } from '../../tests/helpers/fixtures.js';
import { MetadataFetcher } from './fetcher.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const NOW = new Date('2024-06-01T12:00:00.000Z');
const UPLOADS = 'UUtestchannel00000000001';

describe('MetadataFetcher', () => {
  let api: FakeYouTubeApi;

  beforeEach(() => {
    api = new FakeYouTubeApi();
  });

  function createFetcher(budget = 10_000, maxPages = 10) {
    const ledger = new QuotaLedger({ dailyBudget: budget, windowMs: DAY_MS, clock: () => NOW });
    const fetcher = new MetadataFetcher({
      client: api,
      ledger,
      maxPages,
      sleep: async () => undefined,
      clock: () => NOW,
    });
    return { fetcher, ledger };
  }

  describe('resolveChannelId', () => {
    it('should return raw ids without a provider call', async () => {
      const { fetcher, ledger } = createFetcher();

      const id = await fetcher.resolveChannelId({ kind: 'id', value: TEST_CHANNEL_ID });

      expect(id).toBe(TEST_CHANNEL_ID);
      expect(api.totalCalls()).toBe(0);
      expect(ledger.consumed()).toBe(0);
    });

    it('should resolve handles through channels.list for one unit', async () => {
      api.addChannel(3);
      api.handles.set('testworkshop', TEST_CHANNEL_ID);
      const { fetcher, ledger } = createFetcher();

      const id = await fetcher.resolveChannelId({ kind: 'handle', value: 'testworkshop' });

      expect(id).toBe(TEST_CHANNEL_ID);
      expect(ledger.consumed()).toBe(1);
    });

    it('should resolve custom names through search for 100 units', async () => {
      api.searchResults.set('testworkshop', TEST_CHANNEL_ID);
      const { fetcher, ledger } = createFetcher();

      const id = await fetcher.resolveChannelId({ kind: 'custom', value: 'testworkshop' });

      expect(id).toBe(TEST_CHANNEL_ID);
      expect(ledger.consumed()).toBe(100);
      expect(ledger.getSummary().byOperation).toEqual({ search: 100 });
    });

    it('should fail with ChannelNotFoundError for an unknown username', async () => {
      const { fetcher } = createFetcher();

      await expect(
        fetcher.resolveChannelId({ kind: 'username', value: 'nobody' })
      ).rejects.toBeInstanceOf(ChannelNotFoundError);
    });

    it('should not search when the search cost exceeds the remaining quota', async () => {
      api.searchResults.set('testworkshop', TEST_CHANNEL_ID);
      const { fetcher } = createFetcher(99);

      await expect(
        fetcher.resolveChannelId({ kind: 'custom', value: 'testworkshop' })
      ).rejects.toBeInstanceOf(QuotaExceededError);
      expect(api.calls.search).toBe(0);
    });
  });

  describe('fetchChannel', () => {
    it('should convert the provider channel into a record', async () => {
      api.addChannel(3);
      const { fetcher, ledger } = createFetcher();

      const channel = await fetcher.fetchChannel(TEST_CHANNEL_ID);

      expect(channel.channelId).toBe(TEST_CHANNEL_ID);
      expect(channel.videoCount).toBe(3);
      expect(channel.uploadsPlaylistId).toBe(UPLOADS);
      expect(channel.fetchedAt).toBe('2024-06-01T12:00:00.000Z');
      expect(channel.schemaVersion).toBe(1);
      expect(ledger.consumed()).toBe(1);
    });

    it('should fail with ChannelNotFoundError when the channel does not exist', async () => {
      const { fetcher } = createFetcher();

      await expect(fetcher.fetchChannel('UCmissing')).rejects.toBeInstanceOf(ChannelNotFoundError);
    });

    it('should retry a transient failure once', async () => {
      api.addChannel(3);
      api.failNext('channels');
      const { fetcher, ledger } = createFetcher();

      const channel = await fetcher.fetchChannel(TEST_CHANNEL_ID);

      expect(channel.title).toBe('Test Workshop');
      expect(api.calls.channels).toBe(2);
      expect(ledger.consumed()).toBe(2);
    });

    it('should surface the error after the retry also fails', async () => {
      api.addChannel(3);
      api.failNext('channels');
      api.failNext('channels');
      const { fetcher } = createFetcher();

      await expect(fetcher.fetchChannel(TEST_CHANNEL_ID)).rejects.toBeInstanceOf(ProviderError);
      expect(api.calls.channels).toBe(2);
    });

    it('should not retry non-retryable failures', async () => {
      api.addChannel(3);
      api.failNext('channels', new ProviderError('Authentication failed', 'youtube', 401, false));
      const { fetcher } = createFetcher();

      await expect(fetcher.fetchChannel(TEST_CHANNEL_ID)).rejects.toThrow('Authentication failed');
      expect(api.calls.channels).toBe(1);
    });

    it('should fail fast without contacting the provider when quota is exhausted', async () => {
      api.addChannel(3);
      const { fetcher } = createFetcher(0);

      await expect(fetcher.fetchChannel(TEST_CHANNEL_ID)).rejects.toBeInstanceOf(QuotaExceededError);
      expect(api.totalCalls()).toBe(0);
    });
  });

  describe('fetchAllVideos', () => {
    it('should follow pagination until the last page', async () => {
      api.addChannel(120);
      const { fetcher, ledger } = createFetcher();

      const videos = await fetcher.fetchAllVideos(TEST_CHANNEL_ID, UPLOADS);

      expect(videos).toHaveLength(120);
      expect(videos[0]?.videoId).toBe('vid0119');
      expect(videos[119]?.videoId).toBe('vid0000');
      expect(videos.every((video) => !video.hasDetails)).toBe(true);
      expect(api.calls.playlistItems).toBe(3);
      expect(ledger.consumed()).toBe(3);
    });

    it('should truncate silently at the page cap', async () => {
      api.addChannel(120);
      const { fetcher } = createFetcher(10_000, 2);

      const videos = await fetcher.fetchAllVideos(TEST_CHANNEL_ID, UPLOADS);

      expect(videos).toHaveLength(100);
      expect(api.calls.playlistItems).toBe(2);
    });

    it('should drop duplicate playlist entries', async () => {
      const channel = api.addChannel(3);
      const items = api.uploads.get(channel.uploadsPlaylistId) ?? [];
      api.uploads.set(channel.uploadsPlaylistId, [...items, ...items]);
      const { fetcher } = createFetcher();

      const videos = await fetcher.fetchAllVideos(TEST_CHANNEL_ID, UPLOADS);

      expect(videos.map((video) => video.videoId)).toEqual(['vid0002', 'vid0001', 'vid0000']);
    });

    it('should treat a missing uploads playlist as no videos', async () => {
      const { fetcher } = createFetcher();

      await expect(fetcher.fetchAllVideos(TEST_CHANNEL_ID, 'UUnothing')).resolves.toEqual([]);
    });

    it('should stop paging when quota runs out mid-list', async () => {
      api.addChannel(120);
      const { fetcher } = createFetcher(2);

      await expect(fetcher.fetchAllVideos(TEST_CHANNEL_ID, UPLOADS)).rejects.toBeInstanceOf(
        QuotaExceededError
      );
      expect(api.calls.playlistItems).toBe(2);
    });
  });

  describe('fetchVideoDetails', () => {
    it('should enrich videos in batches of 50', async () => {
      api.addChannel(120);
      const { fetcher, ledger } = createFetcher();
      const videos = await fetcher.fetchAllVideos(TEST_CHANNEL_ID, UPLOADS);

      const enriched = await fetcher.fetchVideoDetails(videos);

      expect(enriched).toHaveLength(120);
      expect(enriched.every((video) => video.hasDetails)).toBe(true);
      expect(enriched[0]?.viewCount).toBe(1119);
      expect(enriched[0]?.tags).toEqual(['woodworking']);
      expect(api.calls.videos).toBe(3);
      expect(ledger.consumed()).toBe(6);
    });

    it('should keep a batch metadata-only when its retry also fails', async () => {
      api.addChannel(60);
      const { fetcher } = createFetcher();
      const videos = await fetcher.fetchAllVideos(TEST_CHANNEL_ID, UPLOADS);
      api.failNext('videos');
      api.failNext('videos');

      const enriched = await fetcher.fetchVideoDetails(videos);

      expect(enriched).toHaveLength(60);
      expect(enriched.slice(0, 50).every((video) => !video.hasDetails)).toBe(true);
      expect(enriched.slice(50).every((video) => video.hasDetails)).toBe(true);
      expect(enriched[0]?.viewCount).toBeNull();
      expect(api.calls.videos).toBe(3);
    });

    it('should retry a failed batch once and keep its details', async () => {
      api.addChannel(10);
      const { fetcher } = createFetcher();
      const videos = await fetcher.fetchAllVideos(TEST_CHANNEL_ID, UPLOADS);
      api.failNext('videos', new ProviderError('Invalid JSON from videos', 'youtube', 200, false));

      const enriched = await fetcher.fetchVideoDetails(videos);

      expect(enriched.every((video) => video.hasDetails)).toBe(true);
      expect(api.calls.videos).toBe(2);
    });

    it('should leave videos the provider omits without details', async () => {
      api.addChannel(3);
      api.hidden.add('vid0001');
      const { fetcher } = createFetcher();
      const videos = await fetcher.fetchAllVideos(TEST_CHANNEL_ID, UPLOADS);

      const enriched = await fetcher.fetchVideoDetails(videos);

      expect(enriched.map((video) => [video.videoId, video.hasDetails])).toEqual([
        ['vid0002', true],
        ['vid0001', false],
        ['vid0000', true],
      ]);
    });

    it('should propagate quota exhaustion instead of returning a partial list', async () => {
      api.addChannel(60);
      const { fetcher } = createFetcher(3);
      const videos = await fetcher.fetchAllVideos(TEST_CHANNEL_ID, UPLOADS);

      await expect(fetcher.fetchVideoDetails(videos)).rejects.toBeInstanceOf(QuotaExceededError);
      expect(api.calls.videos).toBe(1);
    });
  });
});
