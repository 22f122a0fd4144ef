/**
 * Path Resolution Utilities
 *
 * Provides consistent path generation for the file-backed store.
 *
 * Directory Structure:
 * ```
 * ~/.channelscope/                         # Default data directory
 * ├── quota.json                           # Quota ledger snapshot
 * ├── references/
 * │   └── <sha256>.json                    # Reference -> channel id mapping
 * └── channels/
 *     └── <channel_id>/                    # e.g., UCabcdefghijklmnopqrstuv
 *         ├── channel.json                 # ChannelRecord
 *         ├── videos.json                  # VideoRecord[] (append/update only)
 *         ├── analysis.json                # Current AnalysisRecord
 *         └── history.json                 # Replaced analyses (audit)
 * ```
 *
 * @module storage/paths
 */

import { createHash } from 'node:crypto';
import * as path from 'node:path';
import * as os from 'node:os';

export type ChannelFile = 'channel' | 'videos' | 'analysis' | 'history';

/**
 * Validates an ID string to prevent path traversal attacks.
 *
 * Rejects IDs containing:
 * - `..` (parent directory traversal)
 * - `/` (forward slash - Unix path separator)
 * - `\` (backslash - Windows path separator)
 *
 * @throws {Error} If the ID is empty or contains path traversal characters
 */
export function validateIdSecurity(id: string, idName: string): void {
  if (!id || id.trim() === '') {
    throw new Error(`${idName} is required`);
  }
  if (id.includes('..') || id.includes('/') || id.includes('\\')) {
    throw new Error(`${idName} contains invalid characters (path traversal not allowed)`);
  }
}

/**
 * Expands a leading `~` and resolves relative paths.
 */
export function resolveDataDir(dir: string): string {
  if (dir.startsWith('~')) {
    return path.join(os.homedir(), dir.slice(1));
  }
  return path.resolve(dir);
}

/**
 * Gets the root data directory for the application.
 *
 * Uses `CHANNELSCOPE_DATA_DIR` if set, otherwise `~/.channelscope/`.
 *
 * @example
 * ```typescript
 * getDataDir({ CHANNELSCOPE_DATA_DIR: '/custom/path' }); // '/custom/path'
 * getDataDir({}); // '/Users/username/.channelscope'
 * ```
 */
export function getDataDir(env: Record<string, string | undefined> = process.env): string {
  const envDir = env.CHANNELSCOPE_DATA_DIR;
  if (envDir) {
    return resolveDataDir(envDir);
  }
  return path.join(os.homedir(), '.channelscope');
}

export function getChannelsDir(dataDir: string): string {
  return path.join(dataDir, 'channels');
}

/**
 * @throws {Error} If channelId is empty or unsafe
 */
export function getChannelDir(dataDir: string, channelId: string): string {
  validateIdSecurity(channelId, 'channelId');
  return path.join(getChannelsDir(dataDir), channelId);
}

/**
 * @example
 * ```typescript
 * getChannelFilePath('/data', 'UCabc', 'analysis');
 * // '/data/channels/UCabc/analysis.json'
 * ```
 */
export function getChannelFilePath(dataDir: string, channelId: string, file: ChannelFile): string {
  return path.join(getChannelDir(dataDir, channelId), `${file}.json`);
}

export function getQuotaPath(dataDir: string): string {
  return path.join(dataDir, 'quota.json');
}

/**
 * File for a reference mapping, named by the reference's digest so user
 * input never becomes part of a path
 */
export function getReferencePath(dataDir: string, reference: string): string {
  const digest = createHash('sha256').update(reference).digest('hex');
  return path.join(dataDir, 'references', `${digest}.json`);
}
