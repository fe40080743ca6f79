export { createApp } from './app';
export { createLedgerCore, LedgerCore, LedgerCoreOptions } from './core';

export * from './services/admission';
export * from './services/idempotency';
export * from './services/ledger';
export * from './services/transaction';

export * from './types/ledger';
export { ErrorCode, errorCodeToStatus } from './types/errors';
export { Clock, ManualClock, monotonicClock } from './utils/clock';
export { fromMinorUnits, isValidAmount, toMinorUnits } from './utils/money';
