import type { Transaction } from '../ledger-types.js';

export function makeTransaction(overrides: Partial<Transaction> = {}): Transaction {
  return {
    description: 'Groceries',
    amountCents: 1000,
    kind: 'Expense',
    category: 'Food',
    date: '2024-01-15',
    ...overrides,
  };
}
