/**
 * Schema Migration Framework
 *
 * Lazy upgrade on read, plus the atomic write every persisted record goes
 * through. Upgraded data is still `unknown`: callers validate it with the
 * record's zod schema before use.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { SCHEMA_VERSIONS, type SchemaType } from '../versions.js';

// ============================================================================
// Version Stamping
// ============================================================================

/**
 * Bring a record read from disk up to the current version of its schema.
 *
 * Records written before `schemaVersion` existed, or at an older version,
 * are stamped with the current one: every change so far only added fields
 * with defaults. Records from a newer version are returned untouched, so
 * the schema's version ceiling rejects them instead of silently
 * downgrading.
 *
 * @example
 * const raw: unknown = JSON.parse(fileContent);
 * const analysis = AnalysisRecordSchema.parse(migrateSchema(raw, 'analysis'));
 */
export function migrateSchema(data: unknown, schemaType: SchemaType): unknown {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    return data;
  }
  const current = SCHEMA_VERSIONS[schemaType];
  if (extractSchemaVersion(data) > current) {
    return data;
  }
  return { ...data, schemaVersion: current };
}

/**
 * Extract schema version from data, defaulting to 1 if not present
 */
function extractSchemaVersion(data: object): number {
  if (!('schemaVersion' in data)) {
    return 1;
  }

  const version = data.schemaVersion;
  if (typeof version === 'number' && Number.isInteger(version) && version > 0) {
    return version;
  }

  return 1;
}

// ============================================================================
// Atomic Write
// ============================================================================

let tempCounter = 0;

/**
 * Atomically write JSON data to a file
 *
 * Uses temp file + rename pattern so readers never observe a partial file.
 *
 * Note: If the process crashes between temp file creation and rename,
 * orphaned .tmp.* files may remain in the target directory.
 */
export async function atomicWriteJson(filePath: string, data: unknown): Promise<void> {
  tempCounter += 1;
  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}.${tempCounter}`;
  const json = JSON.stringify(data, null, 2);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, json, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Atomic write failed for ${filePath}: ${message}`, {
      cause: error,
    });
  }
}
