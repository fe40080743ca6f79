/**
 * Ledger outcome errors
 *
 * Every non-success outcome of a submission is one of these. They are
 * returned as values by the transaction engine and only thrown by the HTTP
 * layer, which hands them to the error handler.
 */

import { ApiError } from '../../middlewares/errorHandler';
import { ErrorCode, isErrorCode } from '../../types/errors';
import { FailureSnapshot } from '../../types/ledger';

export abstract class LedgerError extends ApiError {
  toSnapshot(): FailureSnapshot {
    const snapshot: FailureSnapshot = { code: this.errorCode, message: this.message };
    if (this.meta) {
      snapshot.meta = this.meta;
    }
    return snapshot;
  }
}

export class ValidationError extends LedgerError {
  constructor(validationErrors: Record<string, string[]>) {
    super(ErrorCode.VALIDATION_ERROR, 'Validation failed', { validationErrors });
  }
}

/**
 * Admission rejected the caller; retry after retryAfterMs
 */
export class ThrottledError extends LedgerError {
  constructor(
    readonly identity: string,
    readonly retryAfterMs: number
  ) {
    super(ErrorCode.RATE_LIMIT_EXCEEDED, 'Too many requests, please try again later', {
      retryable: true,
      meta: { retryAfterMs },
    });
  }
}

export class VersionConflictError extends LedgerError {
  constructor(readonly currentVersion: number) {
    super(
      ErrorCode.VERSION_CONFLICT,
      `Account version has moved to ${currentVersion}; re-read and retry`,
      { retryable: true, meta: { currentVersion } }
    );
  }
}

export class InsufficientFundsError extends LedgerError {
  constructor(
    readonly balance: number,
    readonly requested: number
  ) {
    super(ErrorCode.INSUFFICIENT_FUNDS, 'Insufficient funds', {
      meta: { balance, requested },
    });
  }
}

export class AccountNotFoundError extends LedgerError {
  constructor(readonly accountId: string) {
    super(ErrorCode.ACCOUNT_NOT_FOUND, `Account ${accountId} not found`);
  }
}

export class AccountAlreadyExistsError extends LedgerError {
  constructor(readonly accountId: string) {
    super(ErrorCode.ACCOUNT_ALREADY_EXISTS, `Account ${accountId} already exists`);
  }
}

export class IdempotencyKeyReusedError extends LedgerError {
  constructor(readonly idempotencyKey: string) {
    super(
      ErrorCode.IDEMPOTENCY_KEY_REUSED,
      `Idempotency key ${idempotencyKey} was already used for a different request`
    );
  }
}

/**
 * Another request holding the same idempotency key has not finished
 */
export class RequestInProgressError extends LedgerError {
  constructor(readonly idempotencyKey: string) {
    super(
      ErrorCode.REQUEST_IN_PROGRESS,
      `A request with idempotency key ${idempotencyKey} is still in progress`,
      { retryable: true }
    );
  }
}

export class RequestCancelledError extends LedgerError {
  constructor() {
    super(ErrorCode.REQUEST_CANCELLED, 'Request cancelled before commit');
  }
}

export class TransientStorageError extends LedgerError {
  constructor(
    message = 'Storage temporarily unavailable',
    readonly reason?: unknown
  ) {
    super(ErrorCode.TRANSIENT_STORAGE_ERROR, message, { retryable: true });
  }
}

/**
 * A stored ledger row breaks an invariant. The account stops accepting
 * mutations until an operator intervenes.
 */
export class LedgerInvariantError extends LedgerError {
  constructor(
    readonly accountId: string,
    readonly violations: string[]
  ) {
    super(
      ErrorCode.LEDGER_INVARIANT_VIOLATION,
      `Ledger invariant violated for account ${accountId}`,
      { isOperational: true, meta: { violations } }
    );
  }
}

/**
 * Rebuild a replayable error from a stored failure snapshot
 */
export class ReplayedError extends LedgerError {
  constructor(snapshot: FailureSnapshot) {
    const code = isErrorCode(snapshot.code) ? snapshot.code : ErrorCode.INTERNAL_ERROR;
    super(code, snapshot.message, { meta: snapshot.meta });
  }
}
