/**
 * Storage Layer
 *
 * Fast cache and persistent store abstractions, with in-memory and
 * file-backed implementations. All file writes use the atomic temp file +
 * rename pattern.
 *
 * @module storage
 */

// Path utilities
export {
  getDataDir,
  resolveDataDir,
  getChannelsDir,
  getChannelDir,
  getChannelFilePath,
  getQuotaPath,
  getReferencePath,
  validateIdSecurity,
  type ChannelFile,
} from './paths.js';

// Atomic operations
export { atomicWriteJson, readJsonFile, isMissingFileError } from './atomic.js';

// Fast cache
export {
  cacheKey,
  referenceCacheKey,
  MemoryCache,
  type CacheKind,
  type FastCache,
  type MemoryCacheOptions,
} from './cache.js';

// Persistent store
export { mergeVideo, mergeVideoList, toHistoryEntry, type PersistentStore } from './store.js';
export { MemoryStore, type MemoryStoreOptions } from './memory-store.js';
export { FileStore, type FileStoreOptions } from './file-store.js';
