/**
 * File Store
 *
 * PersistentStore backed by JSON documents under
 * `<dataDir>/channels/<channelId>/`, plus one small document per resolved
 * reference under `<dataDir>/references/`. Every write goes through
 * atomicWriteJson; reads migrate older schema versions and validate before
 * returning. Read-modify-write updates of one file are chained so two
 * writers in this process never interleave.
 *
 * @module storage/file-store
 */

import { z } from 'zod';
import { PersistenceError } from '../errors/index.js';
import type { Logger } from '../logging/index.js';
import {
  AnalysisHistoryEntrySchema,
  AnalysisRecordSchema,
  ChannelRecordSchema,
  ChannelReferenceMappingSchema,
  VideoRecordSchema,
  migrateSchema,
  type AnalysisHistoryEntry,
  type AnalysisRecord,
  type ChannelRecord,
  type ChannelReferenceMapping,
  type VideoRecord,
} from '../schemas/index.js';
import { atomicWriteJson, readJsonFile } from './atomic.js';
import { getChannelFilePath, getReferencePath, type ChannelFile } from './paths.js';
import { mergeVideoList, toHistoryEntry, type PersistentStore } from './store.js';

export interface FileStoreOptions {
  /** Root data directory */
  dataDir: string;
  clock?: () => Date;
  logger?: Logger;
}

const HistorySchema = z.array(AnalysisHistoryEntrySchema);

export class FileStore implements PersistentStore {
  private readonly dataDir: string;
  private readonly clock: () => Date;
  private readonly logger?: Logger;
  private readonly writeChains: Map<string, Promise<void>> = new Map();

  constructor(options: FileStoreOptions) {
    this.dataDir = options.dataDir;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger;
  }

  // ==========================================================================
  // Channels
  // ==========================================================================

  async getChannel(channelId: string): Promise<ChannelRecord | null> {
    const data = await this.read(channelId, 'channel');
    if (data === null) {
      return null;
    }
    return this.validate(ChannelRecordSchema, migrateSchema(data, 'channel'), channelId, 'channel');
  }

  async saveChannel(record: ChannelRecord): Promise<void> {
    await this.write(record.channelId, 'channel', async () => record);
  }

  // ==========================================================================
  // Videos
  // ==========================================================================

  async getVideo(channelId: string, videoId: string): Promise<VideoRecord | null> {
    const videos = await this.listVideos(channelId);
    return videos.find((video) => video.videoId === videoId) ?? null;
  }

  async upsertVideos(channelId: string, videos: VideoRecord[]): Promise<void> {
    await this.write(channelId, 'videos', async () =>
      mergeVideoList(await this.listVideos(channelId), videos)
    );
  }

  async listVideos(channelId: string): Promise<VideoRecord[]> {
    const data = await this.read(channelId, 'videos');
    if (data === null) {
      return [];
    }
    const migrated = Array.isArray(data)
      ? data.map((video: unknown) => migrateSchema(video, 'video'))
      : data;
    return this.validate(z.array(VideoRecordSchema), migrated, channelId, 'videos');
  }

  // ==========================================================================
  // Analyses
  // ==========================================================================

  async getAnalysis(channelId: string): Promise<AnalysisRecord | null> {
    const data = await this.read(channelId, 'analysis');
    if (data === null) {
      return null;
    }
    return this.validate(
      AnalysisRecordSchema,
      migrateSchema(data, 'analysis'),
      channelId,
      'analysis'
    );
  }

  async saveAnalysis(record: AnalysisRecord): Promise<void> {
    const previous = await this.getAnalysis(record.channelId);
    if (previous) {
      const entry = toHistoryEntry(previous, this.clock());
      await this.write(record.channelId, 'history', async () => [
        ...(await this.listAnalysisHistory(record.channelId)),
        entry,
      ]);
    }
    await this.write(record.channelId, 'analysis', async () => record);
    this.logger?.debug(`[store] Saved analysis for ${record.channelId}`);
  }

  async listAnalysisHistory(channelId: string): Promise<AnalysisHistoryEntry[]> {
    const data = await this.read(channelId, 'history');
    if (data === null) {
      return [];
    }
    return this.validate(HistorySchema, data, channelId, 'history');
  }

  // ==========================================================================
  // Reference Mappings
  // ==========================================================================

  async getReferenceMapping(reference: string): Promise<string | null> {
    let data: unknown;
    try {
      data = await readJsonFile(getReferencePath(this.dataDir, reference));
    } catch (error) {
      throw new PersistenceError(`read reference ${reference}`, { cause: error });
    }
    if (data === null) {
      return null;
    }
    const parsed = ChannelReferenceMappingSchema.safeParse(data);
    if (!parsed.success) {
      throw new PersistenceError(`validate reference ${reference}`, { cause: parsed.error });
    }
    return parsed.data.reference === reference ? parsed.data.channelId : null;
  }

  async saveReferenceMapping(mapping: ChannelReferenceMapping): Promise<void> {
    try {
      await atomicWriteJson(getReferencePath(this.dataDir, mapping.reference), mapping);
    } catch (error) {
      throw new PersistenceError(`write reference ${mapping.reference}`, { cause: error });
    }
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  private async read(channelId: string, file: ChannelFile): Promise<unknown> {
    try {
      return await readJsonFile(getChannelFilePath(this.dataDir, channelId, file));
    } catch (error) {
      throw new PersistenceError(`read ${file} for ${channelId}`, { cause: error });
    }
  }

  private validate<T extends z.ZodTypeAny>(
    schema: T,
    data: unknown,
    channelId: string,
    file: ChannelFile
  ): z.output<T> {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new PersistenceError(`validate ${file} for ${channelId}`, { cause: result.error });
    }
    return result.data;
  }

  /**
   * Serialise writes per file: each write waits for the previous one on
   * the same path, then computes its content and writes it atomically.
   */
  private async write(
    channelId: string,
    file: ChannelFile,
    produce: () => Promise<unknown>
  ): Promise<void> {
    let filePath: string;
    try {
      filePath = getChannelFilePath(this.dataDir, channelId, file);
    } catch (error) {
      throw new PersistenceError(`write ${file} for ${channelId}`, { cause: error });
    }

    const previous = this.writeChains.get(filePath) ?? Promise.resolve();
    // The previous writer reports its own failure
    const next = previous
      .catch(() => undefined)
      .then(async () => atomicWriteJson(filePath, await produce()));
    this.writeChains.set(filePath, next);

    try {
      await next;
    } catch (error) {
      throw new PersistenceError(`write ${file} for ${channelId}`, { cause: error });
    } finally {
      if (this.writeChains.get(filePath) === next) {
        this.writeChains.delete(filePath);
      }
    }
  }
}
