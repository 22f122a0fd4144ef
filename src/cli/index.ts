#!/usr/bin/env node
/**
 * channelscope CLI
 *
 * Usage:
 *   channelscope --help
 *   channelscope analyze https://www.youtube.com/@somecreator
 *   channelscope show UCxxxxxxxxxxxxxxxxxxxxxx --format json
 *   channelscope invalidate @somecreator
 *   channelscope quota
 *
 * @module cli
 */

import { Command, CommanderError } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';
import { createCommandContext, type ContextFactory } from './context.js';

// ============================================================================
// Main Program Setup
// ============================================================================

export interface ProgramOptions {
  /** Builds the engine for each command (default: file store + real providers) */
  createContext?: ContextFactory;
}

/**
 * Create and configure the CLI program. Commander errors are thrown as
 * CommanderError instead of exiting the process.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('channelscope')
    .description('Summaries of YouTube channels: cached, stored, or freshly analyzed with Gemini')
    .version(VERSION, '-V, --version', 'Display version number');

  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override default data directory (~/.channelscope)');

  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();
    if (opts.verbose && opts.quiet) {
      thisCommand.error('Cannot use both --verbose and --quiet flags', {
        code: 'channelscope.conflictingFlags',
        exitCode: EXIT_CODES.USAGE_ERROR,
      });
    }
    thisCommand.setOptionValue('_baseCommand', new BaseCommand(opts));
  });

  // before registration, so subcommands inherit it
  program.exitOverride();

  registerCommands(program, options.createContext ?? createCommandContext);

  return program;
}

/**
 * Exit code for a CommanderError: help and version are successes, every
 * other parse failure is a usage error.
 */
export function exitCodeForCommanderError(error: CommanderError): number {
  if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
    return EXIT_CODES.SUCCESS;
  }
  return EXIT_CODES.USAGE_ERROR;
}

/**
 * Main CLI entry point. Command failures set `process.exitCode`; nothing
 * here calls process.exit, so background refreshes can settle first.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      process.exitCode = exitCodeForCommanderError(error);
      return;
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = EXIT_CODES.ERROR;
  }
}

if (require.main === module) {
  void main();
}
