/**
 * Ledger Service
 *
 * Business logic layer for ledger operations.
 * Loads and saves through a repository and works on a store the caller owns.
 */

import type { Logger } from '@ledger/observability';
import { LedgerStore } from './ledger-store.js';
import type { LedgerRepository } from './ledger-repository.js';
import { buildExpenseChart, summarizeLedger } from './ledger-summary.js';
import { parseTransactionFields } from './money.js';
import type {
  ChartOptions,
  ChartRow,
  LedgerSummary,
  Transaction,
  TransactionFields,
} from './ledger-types.js';

export interface LedgerServiceOptions {
  repository: LedgerRepository;
  filePath: string;
  logger: Logger;
  chart?: ChartOptions;
}

export interface LedgerReport {
  summary: LedgerSummary;
  chart: ChartRow[];
}

export class LedgerService {
  private repository: LedgerRepository;
  private logger: Logger;
  private chart: ChartOptions;
  readonly filePath: string;

  constructor(options: LedgerServiceOptions) {
    this.repository = options.repository;
    this.filePath = options.filePath;
    this.logger = options.logger;
    this.chart = options.chart ?? {};
  }

  /**
   * Load the ledger file into a new store.
   *
   * @throws LedgerFormatError | LedgerParseError | LedgerIOError, nothing is loaded
   */
  async open(): Promise<LedgerStore> {
    const transactions = await this.repository.load(this.filePath);
    this.logger.info({ path: this.filePath, count: transactions.length }, 'Ledger opened');
    return new LedgerStore(transactions);
  }

  /**
   * Parse raw fields and append the result. The store is untouched when
   * any field fails to parse.
   *
   * @throws LedgerParseError
   */
  record(store: LedgerStore, fields: TransactionFields): Transaction {
    const transaction = parseTransactionFields(fields);
    store.add(transaction);
    this.logger.info({ transaction }, 'Transaction recorded');
    return transaction;
  }

  summarize(store: LedgerStore): LedgerReport {
    const summary = summarizeLedger(store);
    return { summary, chart: buildExpenseChart(summary.byCategory, this.chart) };
  }

  /**
   * @returns false when the key is not recognized and nothing moved
   */
  sort(store: LedgerStore, key: string): boolean {
    const sorted = store.sort(key);
    if (sorted) {
      this.logger.debug({ key }, 'Transactions sorted');
    } else {
      this.logger.warn({ key }, 'Unknown sort key, order left unchanged');
    }
    return sorted;
  }

  /**
   * @throws LedgerIOError
   */
  async save(store: LedgerStore): Promise<void> {
    await this.repository.save(this.filePath, store.list());
    this.logger.info({ path: this.filePath, count: store.size }, 'Ledger saved');
  }
}
