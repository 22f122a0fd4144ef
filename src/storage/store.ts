/**
 * Persistent Store
 *
 * Authoritative storage for channel, video and analysis records. Exactly
 * one current analysis exists per channel; saving a new one replaces it and
 * appends the replaced record's timestamp and model to the history.
 *
 * @module storage/store
 */

import type {
  AnalysisHistoryEntry,
  AnalysisRecord,
  ChannelRecord,
  ChannelReferenceMapping,
  VideoRecord,
} from '../schemas/index.js';

export interface PersistentStore {
  getChannel(channelId: string): Promise<ChannelRecord | null>;
  saveChannel(record: ChannelRecord): Promise<void>;

  getVideo(channelId: string, videoId: string): Promise<VideoRecord | null>;
  /** Insert or update by video id; never removes videos */
  upsertVideos(channelId: string, videos: VideoRecord[]): Promise<void>;
  /** All stored videos for a channel, newest first */
  listVideos(channelId: string): Promise<VideoRecord[]>;

  getAnalysis(channelId: string): Promise<AnalysisRecord | null>;
  /** Replace the channel's current analysis */
  saveAnalysis(record: AnalysisRecord): Promise<void>;
  /** Replaced analyses, oldest first */
  listAnalysisHistory(channelId: string): Promise<AnalysisHistoryEntry[]>;

  /** Channel id recorded for a normalised reference, e.g. "handle:somecreator" */
  getReferenceMapping(reference: string): Promise<string | null>;
  saveReferenceMapping(mapping: ChannelReferenceMapping): Promise<void>;
}

/**
 * Merge an incoming video over a stored one.
 *
 * A metadata-only update (failed detail batch) refreshes the playlist
 * fields but keeps statistics already known from an earlier detail fetch.
 */
export function mergeVideo(existing: VideoRecord | undefined, incoming: VideoRecord): VideoRecord {
  if (!existing || incoming.hasDetails || !existing.hasDetails) {
    return incoming;
  }
  return {
    ...existing,
    title: incoming.title,
    description: incoming.description,
    publishedAt: incoming.publishedAt,
    thumbnailUrl: incoming.thumbnailUrl ?? existing.thumbnailUrl,
    fetchedAt: incoming.fetchedAt,
  };
}

/**
 * Merge a batch into a list keyed by video id, newest first
 */
export function mergeVideoList(existing: VideoRecord[], incoming: VideoRecord[]): VideoRecord[] {
  const byId = new Map<string, VideoRecord>();
  for (const video of existing) {
    byId.set(video.videoId, video);
  }
  for (const video of incoming) {
    byId.set(video.videoId, mergeVideo(byId.get(video.videoId), video));
  }
  return [...byId.values()].sort(
    (a, b) => Date.parse(b.publishedAt) - Date.parse(a.publishedAt) || compareIds(a, b)
  );
}

/**
 * History entry recording that `previous` was replaced at `replacedAt`
 */
export function toHistoryEntry(previous: AnalysisRecord, replacedAt: Date): AnalysisHistoryEntry {
  return {
    analyzedAt: previous.analyzedAt,
    modelVersion: previous.modelVersion,
    degraded: previous.degraded,
    replacedAt: replacedAt.toISOString(),
  };
}

function compareIds(a: VideoRecord, b: VideoRecord): number {
  return a.videoId < b.videoId ? -1 : a.videoId > b.videoId ? 1 : 0;
}
