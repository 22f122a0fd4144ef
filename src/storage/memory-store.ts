/**
 * In-Memory Persistent Store
 *
 * Map-backed PersistentStore for tests and embedding. Records are copied
 * on the way in and out.
 *
 * @module storage/memory-store
 */

import type {
  AnalysisHistoryEntry,
  AnalysisRecord,
  ChannelRecord,
  ChannelReferenceMapping,
  VideoRecord,
} from '../schemas/index.js';
import { mergeVideoList, toHistoryEntry, type PersistentStore } from './store.js';

export interface MemoryStoreOptions {
  clock?: () => Date;
}

export class MemoryStore implements PersistentStore {
  private readonly channels: Map<string, ChannelRecord> = new Map();
  private readonly videos: Map<string, VideoRecord[]> = new Map();
  private readonly analyses: Map<string, AnalysisRecord> = new Map();
  private readonly history: Map<string, AnalysisHistoryEntry[]> = new Map();
  private readonly references: Map<string, string> = new Map();
  private readonly clock: () => Date;

  constructor(options: MemoryStoreOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  async getChannel(channelId: string): Promise<ChannelRecord | null> {
    const record = this.channels.get(channelId);
    return record ? { ...record } : null;
  }

  async saveChannel(record: ChannelRecord): Promise<void> {
    this.channels.set(record.channelId, { ...record });
  }

  async getVideo(channelId: string, videoId: string): Promise<VideoRecord | null> {
    const video = (this.videos.get(channelId) ?? []).find((v) => v.videoId === videoId);
    return video ? { ...video, tags: [...video.tags] } : null;
  }

  async upsertVideos(channelId: string, videos: VideoRecord[]): Promise<void> {
    this.videos.set(channelId, mergeVideoList(this.videos.get(channelId) ?? [], videos));
  }

  async listVideos(channelId: string): Promise<VideoRecord[]> {
    return (this.videos.get(channelId) ?? []).map((video) => ({ ...video, tags: [...video.tags] }));
  }

  async getAnalysis(channelId: string): Promise<AnalysisRecord | null> {
    const record = this.analyses.get(channelId);
    return record ? copyAnalysis(record) : null;
  }

  async saveAnalysis(record: AnalysisRecord): Promise<void> {
    const previous = this.analyses.get(record.channelId);
    if (previous) {
      const entries = this.history.get(record.channelId) ?? [];
      this.history.set(record.channelId, [...entries, toHistoryEntry(previous, this.clock())]);
    }
    this.analyses.set(record.channelId, copyAnalysis(record));
  }

  async listAnalysisHistory(channelId: string): Promise<AnalysisHistoryEntry[]> {
    return [...(this.history.get(channelId) ?? [])];
  }

  async getReferenceMapping(reference: string): Promise<string | null> {
    return this.references.get(reference) ?? null;
  }

  async saveReferenceMapping(mapping: ChannelReferenceMapping): Promise<void> {
    this.references.set(mapping.reference, mapping.channelId);
  }
}

function copyAnalysis(record: AnalysisRecord): AnalysisRecord {
  return { ...record, themes: [...record.themes], sampleVideoIds: [...record.sampleVideoIds] };
}
