/**
 * Quota Module
 *
 * @module quota
 */

export {
  QuotaLedger,
  type QuotaLedgerOptions,
  type Reservation,
  type AiSpend,
  type QuotaSummary,
} from './ledger.js';

export { formatQuotaSummary } from './display.js';

export { loadLedgerSnapshot, saveLedgerSnapshot } from './persistence.js';
