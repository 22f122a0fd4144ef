/**
 * Analyze Command
 *
 * Resolve a channel reference to an analysis, computing one if needed.
 *
 * @module cli/commands/analyze
 */

import type { Command } from 'commander';
import { toAnalysisResult } from '../../resolution/index.js';
import { getBaseCommand, type OutputFormat } from '../base-command.js';
import type { ContextFactory } from '../context.js';
import { createSpinner, formatAnalysisResult } from '../formatters/index.js';
import { parseFormat } from './options.js';

export interface AnalyzeOptions {
  format: OutputFormat;
}

export function registerAnalyzeCommand(program: Command, createContext: ContextFactory): void {
  program
    .command('analyze <channel>')
    .description('Show the analysis of a channel, computing a fresh one when none is stored')
    .option('-f, --format <type>', 'Output format: text, json', parseFormat, 'text')
    .action(async (channel: string, options: AnalyzeOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      await base.run(async () => {
        const context = await createContext(base);
        const spinner = createSpinner(`Analyzing ${channel}`, {
          silent: base.isQuiet() || options.format === 'json',
        }).start();

        try {
          const resolved = await context.engine.resolve(channel);
          spinner.succeed(`Analysis ready (${resolved.freshness})`);

          const result = toAnalysisResult(resolved, context.clock());
          if (options.format === 'json') {
            base.json(result);
          } else {
            base.print(formatAnalysisResult(result, base.paint));
          }

          if (context.engine.isComputing(resolved.record.channelId)) {
            base.info('Waiting for the background refresh to finish...');
          }
          await context.engine.whenIdle();
        } catch (error) {
          spinner.fail(`Analysis failed for ${channel}`);
          throw error;
        } finally {
          await context.saveLedger();
        }
      }, options.format);
    });
}
