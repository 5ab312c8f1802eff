/**
 * Interactive ledger menu
 *
 * Reads choices from a prompt, calls the ledger service with the store it was
 * given, and prints the results. Parse errors are reported and the field is
 * asked again; nothing is added until every field parses.
 */

import { AmountSchema, CalendarDateSchema, KindLabelSchema } from '@ledger/types';
import { LedgerError, LedgerParseError } from '@ledger/core';
import type { LedgerService, LedgerStore, TransactionFields } from '@ledger/core';
import type { Logger } from '@ledger/observability';
import type { Prompt } from './prompt.js';
import { formatReport, formatTransactions } from './format.js';

export const MENU_OPTIONS = [
  '1. Add Transaction',
  '2. View Summary',
  '3. View Transactions',
  '4. Sort Transactions',
  '5. Save & Exit',
];

export type MenuOutcome = 'saved' | 'input-closed';

export interface MenuDependencies {
  service: LedgerService;
  store: LedgerStore;
  prompt: Prompt;
  print: (line: string) => void;
  logger: Logger;
  currency: string;
}

type FieldSchema = typeof AmountSchema | typeof KindLabelSchema | typeof CalendarDateSchema;

export class LedgerMenu {
  constructor(private deps: MenuDependencies) {}

  async run(): Promise<MenuOutcome> {
    for (;;) {
      this.printLines(['', ...MENU_OPTIONS]);
      const choice = await this.deps.prompt.ask('Choose an option: ');
      if (choice === null) {
        return this.inputClosed();
      }

      switch (choice.trim()) {
        case '1':
          if (!(await this.addTransaction())) {
            return this.inputClosed();
          }
          break;

        case '2':
          this.printLines(['', ...formatReport(this.deps.service.summarize(this.deps.store), this.deps.currency)]);
          break;

        case '3':
          this.printLines(['', ...formatTransactions(this.deps.store.list(), this.deps.currency)]);
          break;

        case '4':
          if (!(await this.sortTransactions())) {
            return this.inputClosed();
          }
          break;

        case '5':
          if (await this.saveAndExit()) {
            return 'saved';
          }
          break;

        default:
          this.deps.print('Invalid option.');
      }
    }
  }

  /**
   * @returns false when input ended before every field was answered
   */
  private async addTransaction(): Promise<boolean> {
    const description = await this.askField('Description: ');
    if (description === null) return false;
    const amount = await this.askField('Amount: ', AmountSchema);
    if (amount === null) return false;
    const kind = await this.askField('Type (Income/Expense): ', KindLabelSchema);
    if (kind === null) return false;
    const category = await this.askField('Category: ');
    if (category === null) return false;
    const date = await this.askField('Date (yyyy-mm-dd): ', CalendarDateSchema);
    if (date === null) return false;

    const fields: TransactionFields = { description, amount, kind, category, date };
    try {
      this.deps.service.record(this.deps.store, fields);
    } catch (error) {
      if (error instanceof LedgerParseError) {
        this.deps.print(`Error: ${error.message}`);
        return true;
      }
      throw error;
    }

    this.deps.print('Transaction added.');
    return true;
  }

  /**
   * Ask until the answer passes the schema. The raw text is returned
   * untrimmed; the service does the final parse.
   */
  private async askField(question: string, schema?: FieldSchema): Promise<string | null> {
    for (;;) {
      const answer = await this.deps.prompt.ask(question);
      if (answer === null || !schema) {
        return answer;
      }

      const result = schema.safeParse(answer);
      if (result.success) {
        return answer;
      }
      this.deps.print(`Error: ${result.error.errors.map((e) => e.message).join(', ')}`);
    }
  }

  private async sortTransactions(): Promise<boolean> {
    const answer = await this.deps.prompt.ask('Sort by (date/amount/category): ');
    if (answer === null) return false;
    const key = answer.trim();

    if (this.deps.service.sort(this.deps.store, key)) {
      this.deps.print(`Transactions sorted by ${key.toLowerCase()}.`);
    } else {
      this.deps.print(`Unknown sort key "${key}"; transactions left unchanged.`);
    }
    return true;
  }

  private async saveAndExit(): Promise<boolean> {
    try {
      await this.deps.service.save(this.deps.store);
    } catch (error) {
      if (error instanceof LedgerError) {
        this.deps.logger.error({ err: error }, 'Failed to save ledger');
        this.deps.print(`Error: ${error.message}`);
        return false;
      }
      throw error;
    }

    this.deps.print('Data saved. Exiting...');
    return true;
  }

  private inputClosed(): MenuOutcome {
    this.deps.print('Input closed; exiting without saving.');
    return 'input-closed';
  }

  private printLines(lines: readonly string[]): void {
    for (const line of lines) {
      this.deps.print(line);
    }
  }
}
