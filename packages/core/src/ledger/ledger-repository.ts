/**
 * Ledger Repository
 *
 * Data access layer for the ledger file. Reads and writes whole files and
 * never keeps records between calls.
 */

import { readFile, writeFile } from 'node:fs/promises';
import type { Logger } from '@ledger/observability';
import type { Transaction } from './ledger-types.js';
import { LedgerIOError } from './ledger-errors.js';
import { decodeLedger, encodeLedger, fieldsContainingDelimiter } from './ledger-codec.js';

export interface LedgerRepository {
  load(path: string): Promise<Transaction[]>;
  save(path: string, transactions: readonly Transaction[]): Promise<void>;
}

export class FlatFileLedgerRepository implements LedgerRepository {
  constructor(private logger: Logger) {}

  /**
   * Load every transaction in the file at `path`.
   *
   * A missing file is a first run and yields no transactions.
   *
   * @throws LedgerFormatError | LedgerParseError for a malformed line
   * @throws LedgerIOError when the file exists but cannot be read
   */
  async load(path: string): Promise<Transaction[]> {
    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.info({ path }, 'Ledger file not found, starting empty');
        return [];
      }
      throw new LedgerIOError(path, 'read', error);
    }

    const transactions = decodeLedger(content);
    this.logger.debug({ path, count: transactions.length }, 'Ledger file loaded');
    return transactions;
  }

  /**
   * Overwrite the file at `path` with one line per transaction.
   *
   * @throws LedgerIOError when the file cannot be written
   */
  async save(path: string, transactions: readonly Transaction[]): Promise<void> {
    transactions.forEach((transaction, index) => {
      const fields = fieldsContainingDelimiter(transaction);
      if (fields.length > 0) {
        this.logger.warn(
          { path, line: index + 1, fields },
          'Transaction text contains the field delimiter; this line will not load back'
        );
      }
    });

    try {
      await writeFile(path, encodeLedger(transactions), 'utf8');
    } catch (error) {
      throw new LedgerIOError(path, 'write', error);
    }

    this.logger.debug({ path, count: transactions.length }, 'Ledger file saved');
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
