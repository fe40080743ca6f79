import { ErrorCode } from './errors';

export type OperationType = 'debit' | 'credit';

export const OPERATION_TYPES: readonly OperationType[] = ['debit', 'credit'];

/**
 * Versioned balance record for one account.
 * balance is held in minor units (hundredths); see utils/money.
 */
export interface LedgerEntry {
  accountId: string;
  balance: number;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface SubmitRequest {
  accountId: string;
  identity: string;
  idempotencyKey: string;
  operationType: OperationType;
  /** Major units, at most two fractional digits */
  amount: number;
  expectedVersion: number;
}

export interface TransactionReceipt {
  accountId: string;
  operationType: OperationType;
  amount: number;
  newBalance: number;
  newVersion: number;
  timestamp: string;
}

export interface FailureSnapshot {
  code: ErrorCode;
  message: string;
  meta?: Record<string, unknown>;
}

/**
 * What an idempotency record replays
 */
export type ResultSnapshot =
  | { outcome: 'SUCCESS'; receipt: TransactionReceipt }
  | { outcome: 'FAILED'; failure: FailureSnapshot };

// =============================================================================
// IDEMPOTENCY RECORDS
// =============================================================================

export interface ReservationRef {
  accountId: string;
  idempotencyKey: string;
  reservationId: string;
}

export interface PendingReservation extends ReservationRef {
  status: 'PENDING';
  fingerprint: string;
  createdAt: Date;
  leaseExpiresAt: Date;
}

export interface CompletedRecord {
  status: 'COMPLETED';
  accountId: string;
  idempotencyKey: string;
  fingerprint: string;
  result: ResultSnapshot;
  createdAt: Date;
  completedAt: Date;
  expiresAt: Date;
}

export type IdempotencyRecord = PendingReservation | CompletedRecord;

export interface ReserveRequest extends ReservationRef {
  fingerprint: string;
  now: Date;
  leaseMs: number;
}

export type ReserveResult =
  | { status: 'RESERVED'; reservation: PendingReservation }
  | { status: 'PENDING'; record: PendingReservation }
  | { status: 'COMPLETED'; record: CompletedRecord };

// =============================================================================
// COMMITS
// =============================================================================

export interface LedgerMutation {
  reservation: ReservationRef;
  expectedVersion: number;
  newBalance: number;
  result: ResultSnapshot;
  completedAt: Date;
  retentionMs: number;
}

export type CommitResult =
  | { status: 'COMMITTED'; entry: LedgerEntry }
  | { status: 'CONFLICT'; currentVersion: number | null }
  | { status: 'RESERVATION_LOST' };

/**
 * Storage port for ledger rows and idempotency rows.
 *
 * Implementations must make commit() all-or-nothing: the conditional
 * balance/version write and the idempotency finalization become visible
 * together or not at all. Writes for one account never wait on another.
 */
export interface LedgerStore {
  getEntry(accountId: string): Promise<LedgerEntry | null>;
  createEntry(accountId: string, balance: number, now: Date): Promise<LedgerEntry>;

  reserveKey(request: ReserveRequest): Promise<ReserveResult>;
  getRecord(accountId: string, idempotencyKey: string): Promise<IdempotencyRecord | null>;
  /** Resolves false when the reservation is no longer held */
  finalizeKey(
    ref: ReservationRef,
    result: ResultSnapshot,
    completedAt: Date,
    retentionMs: number
  ): Promise<boolean>;
  releaseKey(ref: ReservationRef): Promise<void>;
  purgeExpiredKeys(now: Date): Promise<number>;

  commit(mutation: LedgerMutation): Promise<CommitResult>;
}
