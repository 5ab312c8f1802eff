/**
 * Transaction schemas shared by the ledger core and its callers.
 *
 * Field schemas accept the raw text typed at a prompt or read from a ledger
 * line and output the parsed value, so one definition covers both paths.
 */

import { z } from "zod";

export const TRANSACTION_KINDS = ["Income", "Expense"] as const;

export const TransactionKindSchema = z.enum(TRANSACTION_KINDS);

export type TransactionKind = z.infer<typeof TransactionKindSchema>;

export const SORT_KEYS = ["date", "amount", "category"] as const;

/**
 * Sort key as typed by a user; matched case-insensitively.
 */
export const SortKeySchema = z.string().trim().toLowerCase().pipe(z.enum(SORT_KEYS));

export type SortKey = z.infer<typeof SortKeySchema>;

// sign, whole digits, fraction digits; either digit run may be empty
const AMOUNT_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?$/;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

/**
 * Decimal amount text ("42", "42.5", ".5", "-7.25", "3.125") parsed to integer
 * minor units. Digits past the second fraction digit round half away from
 * zero, so "3.125" is 313 and "-3.125" is -313.
 */
export const AmountSchema = z
  .string()
  .trim()
  .transform((text, ctx) => {
    const match = AMOUNT_PATTERN.exec(text);
    const [, sign, whole = "", fraction = ""] = match ?? [];
    if (!match || (whole === "" && fraction === "")) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid amount "${text}": expected a decimal number`,
      });
      return z.NEVER;
    }

    const roundUp = (fraction[2] ?? "0") >= "5";
    const cents = Number(whole || "0") * 100 + Number(fraction.slice(0, 2).padEnd(2, "0")) + (roundUp ? 1 : 0);
    if (!Number.isSafeInteger(cents)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid amount "${text}": value is too large`,
      });
      return z.NEVER;
    }

    if (cents === 0) {
      return 0;
    }
    return sign === "-" ? -cents : cents;
  });

/**
 * Kind label, case-insensitive ("income", "EXPENSE"), normalized to the enum.
 */
export const KindLabelSchema = z
  .string()
  .trim()
  .transform((text, ctx): TransactionKind => {
    const kind = TRANSACTION_KINDS.find((candidate) => candidate.toLowerCase() === text.toLowerCase());
    if (!kind) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid kind "${text}": expected Income or Expense`,
      });
      return z.NEVER;
    }
    return kind;
  });

export function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }

  const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
  const maxDay = month === 2 && leap ? 29 : (DAYS_IN_MONTH[month - 1] ?? 0);
  return day <= maxDay;
}

/**
 * ISO-8601 calendar date (YYYY-MM-DD) naming a real day
 */
export const CalendarDateSchema = z
  .string()
  .trim()
  .refine(isCalendarDate, (value) => ({
    message: `Invalid date "${value}": expected a calendar date as YYYY-MM-DD`,
  }));

/**
 * A parsed ledger record. Amounts are integer minor units (cents).
 */
export const TransactionSchema = z.object({
  description: z.string(),
  amountCents: z.number().int(),
  kind: TransactionKindSchema,
  category: z.string(),
  date: CalendarDateSchema,
});

export type Transaction = z.infer<typeof TransactionSchema>;

/**
 * Raw text fields of one transaction, parsed into a Transaction.
 * Description and category are free text and kept exactly as given.
 */
export const TransactionFieldsSchema = z
  .object({
    description: z.string(),
    amount: AmountSchema,
    kind: KindLabelSchema,
    category: z.string(),
    date: CalendarDateSchema,
  })
  .strict()
  .transform(
    ({ description, amount, kind, category, date }): Transaction => ({
      description,
      amountCents: amount,
      kind,
      category,
      date,
    })
  );

export type TransactionFields = z.input<typeof TransactionFieldsSchema>;
