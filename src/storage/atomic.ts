/**
 * Atomic File Operations for Storage Layer
 *
 * Atomic writes (temp file + rename) and the matching JSON read.
 *
 * @module storage/atomic
 */

import * as fs from 'node:fs/promises';

// Re-export atomic write from migrations
export { atomicWriteJson } from '../schemas/migrations/index.js';

/**
 * True for the error fs raises when a path does not exist. Checks the code
 * only: fs errors may come from another realm, where `instanceof Error` fails.
 */
export function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT'
  );
}

/**
 * Read and parse a JSON file
 *
 * @returns Parsed JSON data, or null if the file does not exist
 * @throws Error if the JSON is invalid or the read fails
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return null;
    }
    throw error;
  }

  try {
    const data: unknown = JSON.parse(content);
    return data;
  } catch (error) {
    throw new Error(`Invalid JSON in file: ${filePath}`, { cause: error });
  }
}
