/**
 * Ledger Domain Types
 */

export type { Transaction, TransactionFields, TransactionKind, SortKey } from '@ledger/types';

export interface CategoryTotal {
  category: string;
  totalCents: number;
}

export interface LedgerSummary {
  totalIncomeCents: number;
  totalExpensesCents: number;
  netSavingsCents: number;
  /** Expense totals in first-encountered category order */
  byCategory: CategoryTotal[];
  largestCategory: CategoryTotal | null;
}

export interface ChartRow extends CategoryTotal {
  barLength: number;
  bar: string;
}

export interface ChartOptions {
  /** Minor units represented by one marker character */
  unitCents?: number;
  marker?: string;
}
