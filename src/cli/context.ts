/**
 * Command Context
 *
 * What a command needs to talk to the engine: the engine itself, the
 * ledger restored from the data directory, and a way to write the
 * ledger back before the process exits.
 *
 * @module cli/context
 */

import { config } from '../config/index.js';
import { describeError } from '../logging/index.js';
import { loadLedgerSnapshot, saveLedgerSnapshot, type QuotaLedger } from '../quota/index.js';
import { createResolutionEngine, type ResolutionEngine } from '../resolution/index.js';
import type { BaseCommand } from './base-command.js';

export interface CommandContext {
  engine: ResolutionEngine;
  ledger: QuotaLedger;
  clock: () => Date;
  /** Persist the ledger for the next invocation; failures are logged */
  saveLedger(): Promise<void>;
}

export type ContextFactory = (base: BaseCommand) => Promise<CommandContext>;

/**
 * Default context: file store under the data directory, settings from
 * the environment, real provider clients.
 */
export const createCommandContext: ContextFactory = async (base) => {
  const { engine, ledger } = createResolutionEngine({
    settings: config.settings,
    dataDir: base.dataDir,
    logger: base,
  });
  await loadLedgerSnapshot(ledger, base.dataDir, base);

  return {
    engine,
    ledger,
    clock: () => new Date(),
    saveLedger: async () => {
      try {
        await saveLedgerSnapshot(ledger, base.dataDir);
      } catch (error) {
        base.warn(`[quota] Could not save ledger: ${describeError(error)}`);
      }
    },
  };
};
