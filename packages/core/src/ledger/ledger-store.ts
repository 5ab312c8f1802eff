/**
 * Ledger Store
 *
 * Ordered, in-memory sequence of transactions. Insertion order is kept until
 * the caller sorts explicitly. Every aggregate is computed from the sequence
 * on each call; nothing is cached.
 */

import { SortKeySchema } from '@ledger/types';
import type { CategoryTotal, SortKey, Transaction, TransactionKind } from './ledger-types.js';

type Comparator = (a: Transaction, b: Transaction) => number;

const COMPARATORS: Record<SortKey, Comparator> = {
  date: (a, b) => compareText(a.date, b.date),
  amount: (a, b) => b.amountCents - a.amountCents,
  category: (a, b) => compareText(a.category, b.category),
};

// Ordinal order, independent of the host locale
function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export class LedgerStore {
  private transactions: Transaction[] = [];

  constructor(initial: Iterable<Transaction> = []) {
    for (const transaction of initial) {
      this.add(transaction);
    }
  }

  get size(): number {
    return this.transactions.length;
  }

  /**
   * Append a transaction. The store keeps a frozen copy.
   */
  add(transaction: Transaction): void {
    this.transactions.push(Object.freeze({ ...transaction }));
  }

  list(): readonly Transaction[] {
    return [...this.transactions];
  }

  totalIncome(): number {
    return this.sumKind('Income');
  }

  totalExpenses(): number {
    return this.sumKind('Expense');
  }

  netSavings(): number {
    return this.totalIncome() - this.totalExpenses();
  }

  /**
   * Expense totals keyed by category, in first-encountered order.
   */
  spendingByCategory(): Map<string, number> {
    const totals = new Map<string, number>();
    for (const transaction of this.transactions) {
      if (!isKind(transaction, 'Expense')) continue;
      totals.set(transaction.category, (totals.get(transaction.category) ?? 0) + transaction.amountCents);
    }
    return totals;
  }

  /**
   * Category with the highest expense total. On a tie the category
   * encountered first wins. Null when there are no expenses.
   */
  largestCategory(): CategoryTotal | null {
    let largest: CategoryTotal | null = null;
    for (const [category, totalCents] of this.spendingByCategory()) {
      if (!largest || totalCents > largest.totalCents) {
        largest = { category, totalCents };
      }
    }
    return largest;
  }

  /**
   * Reorder in place: date ascending, amount descending, category ascending.
   * The sort is stable. An unrecognized key leaves the order untouched.
   *
   * @returns false when the key was not recognized
   */
  sort(key: string): boolean {
    const parsed = SortKeySchema.safeParse(key);
    if (!parsed.success) {
      return false;
    }

    this.transactions.sort(COMPARATORS[parsed.data]);
    return true;
  }

  private sumKind(kind: TransactionKind): number {
    let total = 0;
    for (const transaction of this.transactions) {
      if (isKind(transaction, kind)) {
        total += transaction.amountCents;
      }
    }
    return total;
  }
}

// Kinds are compared on their label, ignoring case
function isKind(transaction: Transaction, kind: TransactionKind): boolean {
  return transaction.kind.toLowerCase() === kind.toLowerCase();
}
