/**
 * Ledger storage: versioned balance rows, idempotency rows and the
 * all-or-nothing commit of both
 */

export { MemoryLedgerStore } from './memory.ledger.store';
export { MongoLedgerStore, MongoLedgerStoreOptions, isDuplicateKeyError } from './mongo.ledger.store';
export { checkEntryInvariants, checkTransition, parseResultSnapshot } from './ledger.invariants';
export * from './ledger.errors';
