/**
 * @ledger/core - Domain logic for the personal finance ledger
 *
 * The ledger store, its aggregates, and flat-file persistence.
 * Callers own the store and pass it to each service operation.
 */

export * from './ledger/index.js';
