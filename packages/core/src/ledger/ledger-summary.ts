/**
 * Summary and text chart built from a ledger store.
 */

import type { LedgerStore } from './ledger-store.js';
import type { CategoryTotal, ChartOptions, ChartRow, LedgerSummary } from './ledger-types.js';

/** Ten currency units per marker character */
export const DEFAULT_CHART_UNIT_CENTS = 1000;
export const DEFAULT_CHART_MARKER = '#';

export function summarizeLedger(store: LedgerStore): LedgerSummary {
  const totalIncomeCents = store.totalIncome();
  const totalExpensesCents = store.totalExpenses();
  const byCategory = Array.from(store.spendingByCategory(), ([category, totalCents]) => ({
    category,
    totalCents,
  }));

  return {
    totalIncomeCents,
    totalExpensesCents,
    netSavingsCents: totalIncomeCents - totalExpensesCents,
    byCategory,
    largestCategory: store.largestCategory(),
  };
}

/**
 * One bar per category, its length the total divided by the unit and
 * truncated. Zero or negative totals get an empty bar.
 */
export function buildExpenseChart(
  byCategory: readonly CategoryTotal[],
  options: ChartOptions = {}
): ChartRow[] {
  const unitCents = options.unitCents ?? DEFAULT_CHART_UNIT_CENTS;
  const marker = options.marker ?? DEFAULT_CHART_MARKER;
  if (!Number.isInteger(unitCents) || unitCents <= 0) {
    throw new RangeError(`Chart unit must be a positive integer, got ${unitCents}`);
  }

  return byCategory.map(({ category, totalCents }) => {
    const barLength = Math.max(0, Math.trunc(totalCents / unitCents));
    return { category, totalCents, barLength, bar: marker.repeat(barLength) };
  });
}
