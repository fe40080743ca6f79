/**
 * Transaction Engine
 *
 * Applies debit/credit requests to a single account under optimistic
 * concurrency:
 *
 *   validate -> admission -> idempotency -> read -> version check
 *            -> balance check -> conditional commit (+ idempotency record)
 *
 * Every step can end the request. All outcomes come back as a typed
 * SubmitResult; nothing is thrown to the caller. Version mismatches are
 * always surfaced, never retried here: the caller re-reads and decides.
 */

import { AdmissionController } from '../admission';
import { CheckOutcome, IdempotencyService, buildFingerprint } from '../idempotency';
import {
  AccountNotFoundError,
  IdempotencyKeyReusedError,
  InsufficientFundsError,
  LedgerError,
  LedgerInvariantError,
  RequestCancelledError,
  RequestInProgressError,
  ThrottledError,
  TransientStorageError,
  ValidationError,
  VersionConflictError,
} from '../ledger/ledger.errors';
import { checkEntryInvariants, checkTransition } from '../ledger/ledger.invariants';
import {
  addLogContext,
  createServiceLogger,
  haltedAccounts,
  ledgerSubmissionsTotal,
  ledgerSubmitDuration,
} from '../../observability';
import {
  CommitResult,
  LedgerEntry,
  LedgerStore,
  ReservationRef,
  ResultSnapshot,
  SubmitRequest,
  TransactionReceipt,
} from '../../types/ledger';
import { Clock, monotonicClock } from '../../utils/clock';
import { fromMinorUnits, isValidAmount, toMinorUnits } from '../../utils/money';
import { TimeoutError, withTimeout } from '../../utils/timeout';
import { ACCOUNT_ID_PATTERN, validateSubmitRequest } from './transaction.validation';

const log = createServiceLogger('transaction-engine');

export type SubmitResult =
  | { status: 'SUCCESS'; receipt: TransactionReceipt }
  | { status: 'DUPLICATE'; priorResult: ResultSnapshot }
  | { status: 'REJECTED'; error: LedgerError };

export interface SubmitOptions {
  /** Honoured until the commit starts; after that the write runs to completion */
  signal?: AbortSignal;
}

export interface AccountView {
  accountId: string;
  balance: number;
  version: number;
  createdAt: string;
  updatedAt: string;
}

export interface TransactionServiceOptions {
  store: LedgerStore;
  admission: AdmissionController;
  idempotency: IdempotencyService;
  writeTimeoutMs: number;
  /** Extra time a duplicate may spend waiting on the owning request */
  idempotencyWaitMs: number;
  clock?: Clock;
}

const rejected = (error: LedgerError): SubmitResult => ({ status: 'REJECTED', error });

export const toAccountView = (entry: LedgerEntry): AccountView => ({
  accountId: entry.accountId,
  balance: fromMinorUnits(entry.balance),
  version: entry.version,
  createdAt: entry.createdAt.toISOString(),
  updatedAt: entry.updatedAt.toISOString(),
});

const outcomeLabel = (result: SubmitResult): string => {
  if (result.status !== 'REJECTED') return result.status.toLowerCase();
  return result.error.name
    .replace(/Error$/, '')
    .replace(/([a-z])([A-Z])/g, '$1_$2')
    .toLowerCase();
};

export class TransactionService {
  private readonly store: LedgerStore;
  private readonly admission: AdmissionController;
  private readonly idempotency: IdempotencyService;
  private readonly clock: Clock;
  private readonly writeTimeoutMs: number;
  private readonly idempotencyWaitMs: number;
  private readonly halted = new Map<string, string[]>();

  constructor(options: TransactionServiceOptions) {
    this.store = options.store;
    this.admission = options.admission;
    this.idempotency = options.idempotency;
    this.clock = options.clock ?? monotonicClock;
    this.writeTimeoutMs = options.writeTimeoutMs;
    this.idempotencyWaitMs = options.idempotencyWaitMs;
  }

  /**
   * Apply one debit or credit
   */
  async submit(request: SubmitRequest, options: SubmitOptions = {}): Promise<SubmitResult> {
    const started = process.hrtime.bigint();
    addLogContext({
      accountId: request.accountId,
      identity: request.identity,
      idempotencyKey: request.idempotencyKey,
    });

    const result = await this.execute(request, options.signal);

    const outcome = outcomeLabel(result);
    ledgerSubmissionsTotal.inc({ operation: String(request.operationType), outcome });
    ledgerSubmitDuration.observe({ outcome }, Number(process.hrtime.bigint() - started) / 1e9);

    return result;
  }

  /**
   * Open an account at version 1
   */
  async openAccount(accountId: string, initialBalance = 0): Promise<AccountView> {
    const errors: Record<string, string[]> = {};
    if (!ACCOUNT_ID_PATTERN.test(accountId)) {
      errors.accountId = ['Account ID must be 1-64 characters of letters, digits, _ . : -'];
    }
    if (initialBalance !== 0 && !isValidAmount(initialBalance)) {
      errors.initialBalance = ['Initial balance must be zero or a positive amount with at most 2 decimals'];
    }
    if (Object.keys(errors).length > 0) {
      throw new ValidationError(errors);
    }

    const entry = await this.storageCall(
      this.store.createEntry(
        accountId,
        initialBalance === 0 ? 0 : toMinorUnits(initialBalance),
        new Date(this.clock.now())
      ),
      'account creation'
    );

    log.info({ accountId, balance: initialBalance }, 'Account opened');
    return toAccountView(entry);
  }

  async getAccount(accountId: string): Promise<AccountView> {
    const entry = await this.storageCall(this.store.getEntry(accountId), 'ledger read');
    if (!entry) {
      throw new AccountNotFoundError(accountId);
    }
    return toAccountView(entry);
  }

  /**
   * Accounts currently refusing mutations, with the violations that halted them
   */
  getHaltedAccounts(): Map<string, string[]> {
    return new Map(this.halted);
  }

  /**
   * Lift a halt after the row has been repaired out of band
   */
  resumeAccount(accountId: string): boolean {
    const resumed = this.halted.delete(accountId);
    if (resumed) {
      haltedAccounts.set(this.halted.size);
      log.warn({ accountId }, 'Account resumed after invariant halt');
    }
    return resumed;
  }

  private async execute(request: SubmitRequest, signal?: AbortSignal): Promise<SubmitResult> {
    const validationErrors = validateSubmitRequest(request);
    if (validationErrors) {
      return rejected(new ValidationError(validationErrors));
    }

    const { accountId, idempotencyKey } = request;
    const amountMinor = toMinorUnits(request.amount);

    const haltedFor = this.halted.get(accountId);
    if (haltedFor) {
      return rejected(new LedgerInvariantError(accountId, haltedFor));
    }

    // 1. Admission
    let admitted: boolean;
    let retryAfterMs = 0;
    try {
      const decision = await this.bounded(this.admission.tryAdmit(request.identity), 'admission check');
      admitted = decision.admitted;
      retryAfterMs = decision.retryAfterMs;
    } catch (err) {
      return this.transient('Admission backend unavailable', err);
    }
    if (!admitted) {
      return rejected(new ThrottledError(request.identity, retryAfterMs));
    }

    // 2. Idempotency. A timeout here may leave a reservation behind; its
    // lease expiry frees the key.
    let check: CheckOutcome;
    try {
      check = await this.bounded(
        this.idempotency.checkOrReserve(
          accountId,
          idempotencyKey,
          buildFingerprint(request.operationType, amountMinor)
        ),
        'idempotency reservation',
        this.writeTimeoutMs + this.idempotencyWaitMs
      );
    } catch (err) {
      return this.transient('Idempotency store unavailable', err);
    }

    switch (check.status) {
      case 'DUPLICATE':
        return { status: 'DUPLICATE', priorResult: check.record.result };
      case 'MISMATCH':
        return rejected(new IdempotencyKeyReusedError(idempotencyKey));
      case 'IN_PROGRESS':
        return rejected(new RequestInProgressError(idempotencyKey));
      case 'FRESH':
        return this.applyMutation(request, amountMinor, check.reservation, signal);
    }
  }

  /**
   * Steps 3-8. The caller holds the reservation; every exit from here
   * commits, finalizes or releases it.
   */
  private async applyMutation(
    request: SubmitRequest,
    amountMinor: number,
    reservation: ReservationRef,
    signal?: AbortSignal
  ): Promise<SubmitResult> {
    const { accountId, idempotencyKey } = request;

    // 3. Read
    let entry: LedgerEntry | null;
    try {
      entry = await this.bounded(this.store.getEntry(accountId), 'ledger read');
    } catch (err) {
      await this.releaseQuietly(reservation);
      return this.transient('Ledger read failed', err);
    }
    if (!entry) {
      await this.releaseQuietly(reservation);
      return rejected(new AccountNotFoundError(accountId));
    }

    const violations = checkEntryInvariants(entry);
    if (violations.length > 0) {
      this.halt(accountId, violations);
      await this.releaseQuietly(reservation);
      return rejected(new LedgerInvariantError(accountId, violations));
    }

    // 4. Version
    if (request.expectedVersion !== entry.version) {
      await this.releaseQuietly(reservation);
      log.debug(
        { accountId, expectedVersion: request.expectedVersion, currentVersion: entry.version },
        'Version conflict'
      );
      return rejected(new VersionConflictError(entry.version));
    }

    // 5. Balance
    const newBalance =
      request.operationType === 'debit' ? entry.balance - amountMinor : entry.balance + amountMinor;

    if (newBalance < 0) {
      return this.rejectInsufficientFunds(request, entry, reservation);
    }
    if (!Number.isSafeInteger(newBalance)) {
      await this.releaseQuietly(reservation);
      return rejected(
        new ValidationError({ amount: ['Resulting balance exceeds the maximum supported balance'] })
      );
    }

    const transitionViolations = checkTransition(entry, {
      balance: newBalance,
      version: entry.version + 1,
    });
    if (transitionViolations.length > 0) {
      await this.releaseQuietly(reservation);
      return rejected(new LedgerInvariantError(accountId, transitionViolations));
    }

    if (signal?.aborted) {
      await this.releaseQuietly(reservation);
      return rejected(new RequestCancelledError());
    }

    // 6-7. Conditional write and idempotency record, all-or-nothing
    const now = new Date(this.clock.now());
    const receipt: TransactionReceipt = {
      accountId,
      operationType: request.operationType,
      amount: request.amount,
      newBalance: fromMinorUnits(newBalance),
      newVersion: entry.version + 1,
      timestamp: now.toISOString(),
    };

    let commit: CommitResult;
    try {
      commit = await this.bounded(
        this.store.commit({
          reservation,
          expectedVersion: entry.version,
          newBalance,
          result: { outcome: 'SUCCESS', receipt },
          completedAt: now,
          retentionMs: this.idempotency.retentionMs,
        }),
        'ledger commit'
      );
    } catch (err) {
      // If the write lands after a timeout it finalizes the record and the
      // release below matches nothing; if the release lands first the
      // write loses its reservation and aborts
      await this.releaseQuietly(reservation);
      return this.transient('Ledger commit failed', err);
    }

    switch (commit.status) {
      case 'COMMITTED': {
        this.idempotency.settle(reservation);
        const committedViolations = checkEntryInvariants(commit.entry);
        if (committedViolations.length > 0) {
          this.halt(accountId, committedViolations);
        }
        log.info(
          {
            accountId,
            operationType: request.operationType,
            amount: request.amount,
            newVersion: receipt.newVersion,
          },
          'Mutation committed'
        );
        return { status: 'SUCCESS', receipt };
      }
      case 'CONFLICT':
        await this.releaseQuietly(reservation);
        if (commit.currentVersion === null) {
          return rejected(new AccountNotFoundError(accountId));
        }
        log.debug({ accountId, currentVersion: commit.currentVersion }, 'Lost compare-and-swap race');
        return rejected(new VersionConflictError(commit.currentVersion));
      case 'RESERVATION_LOST':
        this.idempotency.settle(reservation);
        log.warn({ accountId, idempotencyKey }, 'Reservation taken over before commit');
        return rejected(new RequestInProgressError(idempotencyKey));
    }
  }

  /**
   * Insufficient funds is deterministic: record it so a retry with the same
   * key gets the same answer instead of another attempt
   */
  private async rejectInsufficientFunds(
    request: SubmitRequest,
    entry: LedgerEntry,
    reservation: ReservationRef
  ): Promise<SubmitResult> {
    const error = new InsufficientFundsError(fromMinorUnits(entry.balance), request.amount);

    try {
      const recorded = await this.bounded(
        this.idempotency.finalize(reservation, { outcome: 'FAILED', failure: error.toSnapshot() }),
        'idempotency finalize'
      );
      if (!recorded) {
        log.warn(
          { accountId: request.accountId, idempotencyKey: request.idempotencyKey },
          'Reservation lost before recording insufficient funds'
        );
      }
    } catch (err) {
      await this.releaseQuietly(reservation);
      return this.transient('Could not record insufficient funds outcome', err);
    }

    log.info(
      { accountId: request.accountId, balance: error.balance, requested: error.requested },
      'Insufficient funds'
    );
    return rejected(error);
  }

  private halt(accountId: string, violations: string[]): void {
    this.halted.set(accountId, violations);
    haltedAccounts.set(this.halted.size);
    log.fatal({ accountId, violations }, 'Ledger invariant violated; account halted');
  }

  /**
   * A failed release is logged, not surfaced: the reservation's lease
   * expires and the key becomes reservable again
   */
  private async releaseQuietly(reservation: ReservationRef): Promise<void> {
    try {
      await this.bounded(this.idempotency.release(reservation), 'idempotency release');
    } catch (err) {
      log.warn(
        { err, accountId: reservation.accountId, idempotencyKey: reservation.idempotencyKey },
        'Failed to release idempotency reservation'
      );
    }
  }

  private transient(message: string, err: unknown): SubmitResult {
    const detail = err instanceof TimeoutError ? `${message}: ${err.message}` : message;
    log.warn({ err }, detail);
    return rejected(new TransientStorageError(detail, err));
  }

  private bounded<T>(work: Promise<T>, operation: string, timeoutMs = this.writeTimeoutMs): Promise<T> {
    return withTimeout(work, timeoutMs, operation);
  }

  /**
   * Storage access for the throwing operations (open, read)
   */
  private async storageCall<T>(work: Promise<T>, operation: string): Promise<T> {
    try {
      return await this.bounded(work, operation);
    } catch (err) {
      if (err instanceof LedgerError) throw err;
      log.warn({ err }, `${operation} failed`);
      throw new TransientStorageError(`${operation} failed`, err);
    }
  }
}
