/**
 * Quota Command
 *
 * Print the current window's consumption, budget and AI spend.
 *
 * @module cli/commands/quota
 */

import type { Command } from 'commander';
import { formatQuotaSummary } from '../../quota/index.js';
import { getBaseCommand, type OutputFormat } from '../base-command.js';
import type { ContextFactory } from '../context.js';
import { parseFormat } from './options.js';

export interface QuotaOptions {
  format: OutputFormat;
}

export function registerQuotaCommand(program: Command, createContext: ContextFactory): void {
  program
    .command('quota')
    .description('Show quota consumption for the current window')
    .option('-f, --format <type>', 'Output format: text, json', parseFormat, 'text')
    .action(async (options: QuotaOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      await base.run(async () => {
        const { ledger } = await createContext(base);
        const summary = ledger.getSummary();
        if (options.format === 'json') {
          base.json(summary);
        } else {
          base.print(formatQuotaSummary(summary));
        }
      }, options.format);
    });
}
