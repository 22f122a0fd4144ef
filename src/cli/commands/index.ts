/**
 * CLI Commands Registry
 *
 * - analyze: resolve a channel, computing when needed
 * - show: print what is stored, never compute
 * - invalidate: drop cache entries for a channel
 * - quota: current window consumption
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import type { ContextFactory } from '../context.js';
import { registerAnalyzeCommand } from './analyze.js';
import { registerInvalidateCommand } from './invalidate.js';
import { registerQuotaCommand } from './quota.js';
import { registerShowCommand } from './show.js';

export function registerCommands(program: Command, createContext: ContextFactory): void {
  registerAnalyzeCommand(program, createContext);
  registerShowCommand(program, createContext);
  registerInvalidateCommand(program, createContext);
  registerQuotaCommand(program, createContext);
}

export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'analyze <channel>', description: 'Analyze a channel (computes when nothing is stored)' },
    { name: 'show <channel>', description: 'Show the stored analysis without computing' },
    { name: 'invalidate <channel>', description: 'Drop cached analysis and metadata' },
    { name: 'quota', description: 'Show quota consumption for the current window' },
  ];
}
