/**
 * Flat File Ledger Repository Tests
 *
 * Runs against a temporary directory on the local file system.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger } from '@ledger/observability';
import { FlatFileLedgerRepository } from '../ledger-repository.js';
import { LedgerFormatError, LedgerIOError, LedgerParseError } from '../ledger-errors.js';
import { makeTransaction } from './fixtures.js';

describe('FlatFileLedgerRepository', () => {
  let dir: string;
  let logs: string[];
  let repository: FlatFileLedgerRepository;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'ledger-repo-'));
    logs = [];
    const logger = createLogger({ level: 'debug' }, { write: (log: string) => logs.push(log) });
    repository = new FlatFileLedgerRepository(logger);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should return no transactions when the file does not exist', async () => {
      const path = join(dir, 'missing.txt');

      await expect(repository.load(path)).resolves.toEqual([]);
      expect(JSON.parse(logs[0]!)).toMatchObject({ path, msg: 'Ledger file not found, starting empty' });
    });

    it('should load plain decimal amounts, rounding to cents', async () => {
      const path = join(dir, 'ledger.txt');
      await writeFile(path, 'Coffee|3.125|Expense|Food|2024-01-01\nTip|.5|Expense|Food|2024-01-02\n');

      await expect(repository.load(path)).resolves.toEqual([
        { description: 'Coffee', amountCents: 313, kind: 'Expense', category: 'Food', date: '2024-01-01' },
        { description: 'Tip', amountCents: 50, kind: 'Expense', category: 'Food', date: '2024-01-02' },
      ]);
    });

    it('should reject a line missing a field', async () => {
      const path = join(dir, 'ledger.txt');
      await writeFile(path, 'Rent|1200.00|Expense|Housing|2024-01-01\nLunch|12.00|Expense|Food\n');

      await expect(repository.load(path)).rejects.toThrow(LedgerFormatError);
    });

    it('should reject an unparseable amount', async () => {
      const path = join(dir, 'ledger.txt');
      await writeFile(path, 'Lunch|twelve|Expense|Food|2024-01-01\n');

      await expect(repository.load(path)).rejects.toThrow(LedgerParseError);
    });

    it('should wrap read failures in LedgerIOError', async () => {
      const error = await repository.load(dir).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(LedgerIOError);
      if (error instanceof LedgerIOError) {
        expect(error.path).toBe(dir);
        expect(error.message.startsWith(`Failed to read ledger file ${dir}:`)).toBe(true);
        expect(error.cause).toBeInstanceOf(Error);
      }
    });
  });

  describe('save', () => {
    it('should write one line per transaction', async () => {
      const path = join(dir, 'ledger.txt');

      await repository.save(path, [
        makeTransaction({ description: 'Paycheck', kind: 'Income', category: 'Work', amountCents: 250000 }),
        makeTransaction({ description: 'Lunch', amountCents: 1250, date: '2024-01-16' }),
      ]);

      await expect(readFile(path, 'utf8')).resolves.toBe(
        'Paycheck|2500.00|Income|Work|2024-01-15\nLunch|12.50|Expense|Food|2024-01-16\n'
      );
    });

    it('should overwrite an existing file', async () => {
      const path = join(dir, 'ledger.txt');
      await writeFile(path, 'stale content\n');

      await repository.save(path, []);

      await expect(readFile(path, 'utf8')).resolves.toBe('');
    });

    it('should surface write failures as LedgerIOError', async () => {
      const path = join(dir, 'no-such-dir', 'ledger.txt');

      await expect(repository.save(path, [makeTransaction()])).rejects.toThrow(LedgerIOError);
    });

    it('should warn when a text field contains the delimiter', async () => {
      const path = join(dir, 'ledger.txt');

      await repository.save(path, [makeTransaction(), makeTransaction({ category: 'Food|Drink' })]);

      const warning = logs.map((log) => JSON.parse(log)).find((entry) => entry.level === 40);
      expect(warning).toMatchObject({
        path,
        line: 2,
        fields: ['category'],
        msg: 'Transaction text contains the field delimiter; this line will not load back',
      });
    });
  });

  describe('round trip', () => {
    it('should load back exactly what was saved', async () => {
      const path = join(dir, 'ledger.txt');
      const transactions = [
        makeTransaction({ description: 'Paycheck', kind: 'Income', category: 'Work', amountCents: 310000 }),
        makeTransaction({ description: 'Café au lait', amountCents: 425, date: '2024-02-29' }),
        makeTransaction({ description: '', amountCents: 0, category: '' }),
      ];

      await repository.save(path, transactions);

      await expect(repository.load(path)).resolves.toEqual(transactions);
    });

    it('should not survive a description containing the delimiter', async () => {
      const path = join(dir, 'ledger.txt');
      await repository.save(path, [makeTransaction({ description: 'Rent | March' })]);

      await expect(repository.load(path)).rejects.toThrow(LedgerFormatError);
    });
  });
});
