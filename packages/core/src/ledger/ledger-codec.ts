/**
 * Line codec for the flat ledger file.
 *
 *   <description>|<amount>|<kind>|<category>|<date>
 *
 * No header, no escaping, no trailing delimiter. Text fields that contain the
 * delimiter produce lines that cannot be decoded again.
 */

import type { Transaction } from './ledger-types.js';
import { LedgerFormatError } from './ledger-errors.js';
import { formatAmount, parseTransactionFields } from './money.js';

export const FIELD_DELIMITER = '|';
export const FIELD_COUNT = 5;

export function encodeTransaction(transaction: Transaction): string {
  return [
    transaction.description,
    formatAmount(transaction.amountCents),
    transaction.kind,
    transaction.category,
    transaction.date,
  ].join(FIELD_DELIMITER);
}

/**
 * @param lineNumber - 1-based, used in error messages
 * @throws LedgerFormatError when the line does not have exactly five fields
 * @throws LedgerParseError when amount, kind or date is malformed
 */
export function decodeTransaction(line: string, lineNumber: number): Transaction {
  const segments = line.split(FIELD_DELIMITER);
  if (segments.length !== FIELD_COUNT) {
    throw new LedgerFormatError(lineNumber, segments.length, FIELD_COUNT);
  }

  const [description, amount, kind, category, date] = segments;
  return parseTransactionFields({ description, amount, kind, category, date }, lineNumber);
}

export function encodeLedger(transactions: readonly Transaction[]): string {
  return transactions.map((transaction) => `${encodeTransaction(transaction)}\n`).join('');
}

/**
 * Decode a whole file. Blank lines are skipped; the first bad line aborts.
 */
export function decodeLedger(content: string): Transaction[] {
  const lines = content.replace(/^\uFEFF/, '').split(/\r?\n/);
  const transactions: Transaction[] = [];

  lines.forEach((line, index) => {
    if (line.trim() === '') return;
    transactions.push(decodeTransaction(line, index + 1));
  });

  return transactions;
}

/**
 * Names of the text fields that would break the line format.
 */
export function fieldsContainingDelimiter(transaction: Transaction): Array<'description' | 'category'> {
  const fields: Array<'description' | 'category'> = [];
  if (transaction.description.includes(FIELD_DELIMITER)) fields.push('description');
  if (transaction.category.includes(FIELD_DELIMITER)) fields.push('category');
  return fields;
}
