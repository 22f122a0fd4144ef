/**
 * Show Command
 *
 * Print the stored analysis of a channel without computing one.
 *
 * @module cli/commands/show
 */

import type { Command } from 'commander';
import { AnalysisNotFoundError } from '../../errors/index.js';
import { toAnalysisResult } from '../../resolution/index.js';
import { getBaseCommand, type OutputFormat } from '../base-command.js';
import type { ContextFactory } from '../context.js';
import { formatAnalysisResult } from '../formatters/index.js';
import { parseFormat } from './options.js';

export interface ShowOptions {
  format: OutputFormat;
}

export function registerShowCommand(program: Command, createContext: ContextFactory): void {
  program
    .command('show <channel>')
    .description('Show the stored analysis of a channel, fresh or stale, without computing')
    .option('-f, --format <type>', 'Output format: text, json', parseFormat, 'text')
    .action(async (channel: string, options: ShowOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      await base.run(async () => {
        const context = await createContext(base);
        try {
          const resolved = await context.engine.getExisting(channel);
          const result = toAnalysisResult(resolved, context.clock());
          if (options.format === 'json') {
            base.json(result);
          } else {
            base.print(formatAnalysisResult(result, base.paint));
          }
        } catch (error) {
          if (error instanceof AnalysisNotFoundError && options.format === 'text') {
            base.print(`Run "channelscope analyze ${channel}" to create one.`);
          }
          throw error;
        } finally {
          await context.saveLedger();
        }
      }, options.format);
    });
}
