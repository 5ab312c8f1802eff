/**
 * Ledger Domain
 *
 * Exports the ledger store, file repository, service, summary helpers,
 * errors, and types.
 */

export { LedgerStore } from './ledger-store.js';

export { FlatFileLedgerRepository } from './ledger-repository.js';
export type { LedgerRepository } from './ledger-repository.js';

export { LedgerService } from './ledger-service.js';
export type { LedgerServiceOptions, LedgerReport } from './ledger-service.js';

export {
  summarizeLedger,
  buildExpenseChart,
  DEFAULT_CHART_UNIT_CENTS,
  DEFAULT_CHART_MARKER,
} from './ledger-summary.js';

export {
  FIELD_DELIMITER,
  FIELD_COUNT,
  encodeTransaction,
  decodeTransaction,
  encodeLedger,
  decodeLedger,
} from './ledger-codec.js';

export { formatAmount, formatMoney, parseTransactionFields } from './money.js';

export { LedgerError, LedgerParseError, LedgerFormatError, LedgerIOError } from './ledger-errors.js';

export type {
  Transaction,
  TransactionFields,
  TransactionKind,
  SortKey,
  CategoryTotal,
  LedgerSummary,
  ChartRow,
  ChartOptions,
} from './ledger-types.js';
