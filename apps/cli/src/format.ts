/**
 * Console rendering for ledger views.
 */

import { formatMoney } from '@ledger/core';
import type { LedgerReport, Transaction } from '@ledger/core';

export function formatTransaction(transaction: Transaction, currency: string): string {
  return [
    transaction.date,
    transaction.kind,
    transaction.category,
    formatMoney(transaction.amountCents, currency),
    transaction.description,
  ].join(' | ');
}

export function formatTransactions(transactions: readonly Transaction[], currency: string): string[] {
  if (transactions.length === 0) {
    return ['--- All Transactions ---', 'No transactions recorded.'];
  }
  return ['--- All Transactions ---', ...transactions.map((t) => formatTransaction(t, currency))];
}

export function formatReport({ summary, chart }: LedgerReport, currency: string): string[] {
  const money = (cents: number) => formatMoney(cents, currency);
  const lines = [
    `Total Income: ${money(summary.totalIncomeCents)}`,
    `Total Expenses: ${money(summary.totalExpensesCents)}`,
    `Net Savings: ${money(summary.netSavingsCents)}`,
    '',
    'Spending by Category:',
  ];

  if (summary.byCategory.length === 0) {
    lines.push('No expenses recorded.');
  }
  for (const { category, totalCents } of summary.byCategory) {
    lines.push(`${category}: ${money(totalCents)}`);
  }

  if (summary.largestCategory) {
    const { category, totalCents } = summary.largestCategory;
    lines.push('', `Most Spent Category: ${category} - ${money(totalCents)}`);
  }

  lines.push('', '--- Expense Chart ---');
  for (const row of chart) {
    lines.push(row.bar ? `${row.category}: ${row.bar}` : `${row.category}:`);
  }

  return lines;
}
