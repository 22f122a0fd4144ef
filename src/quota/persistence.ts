/**
 * Ledger Snapshot Persistence
 *
 * Carries a window's consumption between CLI invocations through
 * `<dataDir>/quota.json`.
 *
 * @module quota/persistence
 */

import type { Logger } from '../logging/index.js';
import { QuotaSnapshotSchema, migrateSchema } from '../schemas/index.js';
import { atomicWriteJson, readJsonFile } from '../storage/atomic.js';
import { getQuotaPath } from '../storage/paths.js';
import type { QuotaLedger } from './ledger.js';

/**
 * Restore the ledger from disk.
 *
 * A missing file or a snapshot from an earlier window leaves the ledger
 * untouched. An unreadable snapshot is logged and ignored: the ledger then
 * starts from zero for this process.
 *
 * @returns true when the snapshot was applied
 */
export async function loadLedgerSnapshot(
  ledger: QuotaLedger,
  dataDir: string,
  logger?: Logger
): Promise<boolean> {
  const filePath = getQuotaPath(dataDir);
  let data: unknown;
  try {
    data = await readJsonFile(filePath);
  } catch (error) {
    logger?.warn(`[quota] Could not read ${filePath}: ${String(error)}`);
    return false;
  }
  if (data === null) {
    return false;
  }

  const parsed = QuotaSnapshotSchema.safeParse(migrateSchema(data, 'quota'));
  if (!parsed.success) {
    logger?.warn(`[quota] Ignoring invalid snapshot at ${filePath}`);
    return false;
  }
  return ledger.restore(parsed.data);
}

export async function saveLedgerSnapshot(ledger: QuotaLedger, dataDir: string): Promise<void> {
  await atomicWriteJson(getQuotaPath(dataDir), ledger.snapshot());
}
