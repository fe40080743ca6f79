/**
 * In-process LedgerStore
 *
 * Every method does its reads and writes without awaiting in between, so
 * each call is atomic with respect to other callers on the event loop. That
 * gives commit() its compare-and-swap semantics and makes the ledger write
 * and the idempotency finalization visible together. Not durable; meant for
 * tests and single-node development.
 */

import {
  CommitResult,
  CompletedRecord,
  IdempotencyRecord,
  LedgerEntry,
  LedgerMutation,
  LedgerStore,
  PendingReservation,
  ReservationRef,
  ReserveRequest,
  ReserveResult,
  ResultSnapshot,
} from '../../types/ledger';
import { AccountAlreadyExistsError } from './ledger.errors';

const recordKey = (accountId: string, idempotencyKey: string): string =>
  `${accountId}\u0000${idempotencyKey}`;

const copyEntry = (entry: LedgerEntry): LedgerEntry => ({ ...entry });

// Records are stored and handed out as deep copies so no caller can edit a
// result that later duplicates replay.
const copyRecord = <T extends IdempotencyRecord>(record: T): T => structuredClone(record);

export class MemoryLedgerStore implements LedgerStore {
  private readonly entries = new Map<string, LedgerEntry>();
  private readonly records = new Map<string, IdempotencyRecord>();

  async getEntry(accountId: string): Promise<LedgerEntry | null> {
    const entry = this.entries.get(accountId);
    return entry ? copyEntry(entry) : null;
  }

  async createEntry(accountId: string, balance: number, now: Date): Promise<LedgerEntry> {
    if (this.entries.has(accountId)) {
      throw new AccountAlreadyExistsError(accountId);
    }
    const entry: LedgerEntry = { accountId, balance, version: 1, createdAt: now, updatedAt: now };
    this.entries.set(accountId, entry);
    return copyEntry(entry);
  }

  async reserveKey(request: ReserveRequest): Promise<ReserveResult> {
    const key = recordKey(request.accountId, request.idempotencyKey);
    const existing = this.records.get(key);
    const now = request.now.getTime();

    if (existing?.status === 'COMPLETED' && existing.expiresAt.getTime() > now) {
      return { status: 'COMPLETED', record: copyRecord(existing) };
    }
    if (existing?.status === 'PENDING' && existing.leaseExpiresAt.getTime() > now) {
      return { status: 'PENDING', record: copyRecord(existing) };
    }

    // Absent, past retention, or an abandoned reservation
    const reservation: PendingReservation = {
      status: 'PENDING',
      accountId: request.accountId,
      idempotencyKey: request.idempotencyKey,
      reservationId: request.reservationId,
      fingerprint: request.fingerprint,
      createdAt: request.now,
      leaseExpiresAt: new Date(now + request.leaseMs),
    };
    this.records.set(key, reservation);
    return { status: 'RESERVED', reservation: copyRecord(reservation) };
  }

  async getRecord(accountId: string, idempotencyKey: string): Promise<IdempotencyRecord | null> {
    const record = this.records.get(recordKey(accountId, idempotencyKey));
    return record ? copyRecord(record) : null;
  }

  async finalizeKey(
    ref: ReservationRef,
    result: ResultSnapshot,
    completedAt: Date,
    retentionMs: number
  ): Promise<boolean> {
    return this.completeReservation(ref, result, completedAt, retentionMs);
  }

  async releaseKey(ref: ReservationRef): Promise<void> {
    if (this.holds(ref)) {
      this.records.delete(recordKey(ref.accountId, ref.idempotencyKey));
    }
  }

  async purgeExpiredKeys(now: Date): Promise<number> {
    let purged = 0;
    for (const [key, record] of this.records) {
      if (record.status === 'COMPLETED' && record.expiresAt.getTime() <= now.getTime()) {
        this.records.delete(key);
        purged++;
      }
    }
    return purged;
  }

  async commit(mutation: LedgerMutation): Promise<CommitResult> {
    const { reservation } = mutation;
    const entry = this.entries.get(reservation.accountId);

    if (!entry || entry.version !== mutation.expectedVersion) {
      return { status: 'CONFLICT', currentVersion: entry ? entry.version : null };
    }
    if (!this.holds(reservation)) {
      return { status: 'RESERVATION_LOST' };
    }

    entry.balance = mutation.newBalance;
    entry.version += 1;
    entry.updatedAt = mutation.completedAt;
    this.completeReservation(reservation, mutation.result, mutation.completedAt, mutation.retentionMs);

    return { status: 'COMMITTED', entry: copyEntry(entry) };
  }

  /**
   * Overwrite a row as-is, bypassing every check. Lets tests and repair
   * tooling stage arbitrary state.
   */
  forceEntry(entry: LedgerEntry): void {
    this.entries.set(entry.accountId, { ...entry });
  }

  private holds(ref: ReservationRef): boolean {
    const record = this.records.get(recordKey(ref.accountId, ref.idempotencyKey));
    return record?.status === 'PENDING' && record.reservationId === ref.reservationId;
  }

  private completeReservation(
    ref: ReservationRef,
    result: ResultSnapshot,
    completedAt: Date,
    retentionMs: number
  ): boolean {
    const key = recordKey(ref.accountId, ref.idempotencyKey);
    const record = this.records.get(key);
    if (record?.status !== 'PENDING' || record.reservationId !== ref.reservationId) {
      return false;
    }

    const completed: CompletedRecord = {
      status: 'COMPLETED',
      accountId: record.accountId,
      idempotencyKey: record.idempotencyKey,
      fingerprint: record.fingerprint,
      result: structuredClone(result),
      createdAt: record.createdAt,
      completedAt,
      expiresAt: new Date(completedAt.getTime() + retentionMs),
    };
    this.records.set(key, completed);
    return true;
  }
}
