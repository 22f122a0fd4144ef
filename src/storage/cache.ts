/**
 * Fast Cache
 *
 * Volatile TTL key-value tier in front of the persistent store. Entries are
 * disposable projections: losing all of them costs time and quota, never
 * correctness. Values are plain JSON and are re-validated by readers.
 *
 * @module storage/cache
 */

import { createHash } from 'node:crypto';

// ============================================================================
// Keys
// ============================================================================

/**
 * Namespaces stored in the cache
 * - channel_analysis: AnalysisRecord by channel id
 * - channel_meta: ChannelRecord by channel id
 * - video_list: VideoRecord[] by uploads playlist id
 * - channel_url: channel id by hashed free-form reference
 */
export type CacheKind = 'channel_analysis' | 'channel_meta' | 'video_list' | 'channel_url';

/**
 * Build a namespaced key, e.g. `channel_analysis:UCabc`
 */
export function cacheKey(kind: CacheKind, id: string): string {
  return `${kind}:${id}`;
}

/**
 * Key for a free-form channel reference (URL, handle...). References are
 * hashed so arbitrary user input never ends up in a key verbatim.
 */
export function referenceCacheKey(reference: string): string {
  const digest = createHash('sha256').update(reference.trim()).digest('hex');
  return cacheKey('channel_url', digest);
}

// ============================================================================
// Interface
// ============================================================================

export interface FastCache {
  /** Value for `key`, or undefined when absent or expired */
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
}

// ============================================================================
// In-Memory Implementation
// ============================================================================

interface Entry {
  json: string;
  expiresAt: number;
}

export interface MemoryCacheOptions {
  /** Time source (default: system clock) */
  clock?: () => Date;
}

/**
 * Process-local cache. Values are stored serialised, so callers never share
 * object references with the cache.
 */
export class MemoryCache implements FastCache {
  private readonly entries: Map<string, Entry> = new Map();
  private readonly clock: () => Date;

  constructor(options: MemoryCacheOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  async get(key: string): Promise<unknown> {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.clock().getTime() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    const value: unknown = JSON.parse(entry.json);
    return value;
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    const now = this.clock().getTime();
    this.sweep(now);
    if (ttlSeconds <= 0) {
      this.entries.delete(key);
      return;
    }
    this.entries.set(key, {
      json: JSON.stringify(value),
      expiresAt: now + ttlSeconds * 1000,
    });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  /** Drop everything, as a restart would */
  clear(): void {
    this.entries.clear();
  }

  /** Number of entries held, including expired ones not yet evicted */
  get size(): number {
    return this.entries.size;
  }

  /** Evict expired entries, including keys nobody reads again */
  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
      }
    }
  }
}
