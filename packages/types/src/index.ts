/**
 * @ledger/types
 *
 * Shared zod schemas and inferred types for ledger transactions.
 */

export * from "./transaction.schema.js";
