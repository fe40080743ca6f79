export { LedgerEntryModel, ILedgerEntry } from './LedgerEntry';
export { IdempotencyRecordModel, IIdempotencyRecord, IdempotencyStatus } from './IdempotencyRecord';
