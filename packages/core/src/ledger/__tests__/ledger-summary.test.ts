import { describe, it, expect } from 'vitest';
import { LedgerStore } from '../ledger-store.js';
import { buildExpenseChart, summarizeLedger } from '../ledger-summary.js';
import { makeTransaction } from './fixtures.js';

describe('summarizeLedger', () => {
  it('should summarize an empty ledger', () => {
    expect(summarizeLedger(new LedgerStore())).toEqual({
      totalIncomeCents: 0,
      totalExpensesCents: 0,
      netSavingsCents: 0,
      byCategory: [],
      largestCategory: null,
    });
  });

  it('should compute totals and per-category spending', () => {
    const store = new LedgerStore([
      makeTransaction({ kind: 'Income', category: 'Work', amountCents: 200000 }),
      makeTransaction({ category: 'Food', amountCents: 3000 }),
      makeTransaction({ category: 'Rent', amountCents: 10000 }),
    ]);

    expect(summarizeLedger(store)).toEqual({
      totalIncomeCents: 200000,
      totalExpensesCents: 13000,
      netSavingsCents: 187000,
      byCategory: [
        { category: 'Food', totalCents: 3000 },
        { category: 'Rent', totalCents: 10000 },
      ],
      largestCategory: { category: 'Rent', totalCents: 10000 },
    });
  });
});

describe('buildExpenseChart', () => {
  it('should draw one marker per ten currency units, truncating', () => {
    const rows = buildExpenseChart([
      { category: 'Food', totalCents: 12500 },
      { category: 'Snacks', totalCents: 999 },
      { category: 'Rent', totalCents: 3000 },
    ]);

    expect(rows).toEqual([
      { category: 'Food', totalCents: 12500, barLength: 12, bar: '############' },
      { category: 'Snacks', totalCents: 999, barLength: 0, bar: '' },
      { category: 'Rent', totalCents: 3000, barLength: 3, bar: '###' },
    ]);
  });

  it('should draw an empty bar for negative totals', () => {
    const [row] = buildExpenseChart([{ category: 'Refunds', totalCents: -5000 }]);

    expect(row?.barLength).toBe(0);
    expect(row?.bar).toBe('');
  });

  it('should honor a custom unit and marker', () => {
    const [row] = buildExpenseChart([{ category: 'Food', totalCents: 500 }], { unitCents: 100, marker: '*' });

    expect(row?.bar).toBe('*****');
  });

  it('should reject a non-positive unit', () => {
    expect(() => buildExpenseChart([], { unitCents: 0 })).toThrow(RangeError);
  });
});
