/**
 * CLI Formatters
 *
 * @module cli/formatters
 */

export {
  ProgressSpinner,
  createSpinner,
  formatElapsed,
  type SpinnerOptions,
} from './progress.js';

export { formatAnalysisResult } from './analysis.js';
