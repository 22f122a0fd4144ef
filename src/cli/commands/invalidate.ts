/**
 * Invalidate Command
 *
 * @module cli/commands/invalidate
 */

import type { Command } from 'commander';
import { getBaseCommand } from '../base-command.js';
import type { ContextFactory } from '../context.js';

export function registerInvalidateCommand(program: Command, createContext: ContextFactory): void {
  program
    .command('invalidate <channel>')
    .description('Drop cached analysis and metadata for a channel (stored records are kept)')
    .action(async (channel: string, _options: unknown, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      await base.run(async () => {
        const context = await createContext(base);
        try {
          const channelId = await context.engine.invalidate(channel);
          base.success(`Invalidated cache for ${channelId}`);
        } finally {
          await context.saveLedger();
        }
      });
    });
}
