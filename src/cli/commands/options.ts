/**
 * Shared option parsers
 *
 * @module cli/commands/options
 */

import { InvalidArgumentError } from 'commander';
import type { OutputFormat } from '../base-command.js';

export function parseFormat(value: string): OutputFormat {
  if (value === 'text' || value === 'json') {
    return value;
  }
  throw new InvalidArgumentError('Allowed formats: text, json.');
}
