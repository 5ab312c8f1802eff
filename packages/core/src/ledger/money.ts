/**
 * Amount formatting and raw field parsing.
 */

import { TransactionFieldsSchema } from '@ledger/types';
import type { Transaction, TransactionFields } from './ledger-types.js';
import { LedgerParseError } from './ledger-errors.js';

/**
 * Locale-independent decimal text with two fraction digits ("1234.50", "-3.05").
 */
export function formatAmount(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  const absolute = Math.abs(cents);
  const whole = Math.trunc(absolute / 100);
  const fraction = String(absolute % 100).padStart(2, '0');
  return `${sign}${whole}.${fraction}`;
}

const moneyFormatters = new Map<string, Intl.NumberFormat>();

/**
 * Display form for people, e.g. "$1,234.50".
 */
export function formatMoney(cents: number, currency = 'USD'): string {
  let formatter = moneyFormatters.get(currency);
  if (!formatter) {
    formatter = new Intl.NumberFormat('en-US', { style: 'currency', currency });
    moneyFormatters.set(currency, formatter);
  }
  return formatter.format(cents / 100);
}

/**
 * Parse raw text fields into a Transaction.
 *
 * @param line - 1-based ledger file line, included in the error when given
 * @throws LedgerParseError listing every field that failed
 */
export function parseTransactionFields(fields: TransactionFields, line?: number): Transaction {
  const result = TransactionFieldsSchema.safeParse(fields);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new LedgerParseError(errors, line);
  }

  return result.data;
}
