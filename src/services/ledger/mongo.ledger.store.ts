/**
 * MongoDB LedgerStore
 *
 * Ledger rows and idempotency rows live in two collections. commit() runs
 * the conditional write (filter on accountId + expected version) and the
 * idempotency finalization in one multi-document transaction, so both land
 * or neither does. Concurrent commits on the same account surface as write
 * conflicts, which the driver retries; the retry then sees the moved
 * version and reports a conflict.
 */

import mongoose, { Connection } from 'mongoose';

import { IIdempotencyRecord, IdempotencyRecordModel, ILedgerEntry, LedgerEntryModel } from '../../models';
import { createServiceLogger } from '../../observability';
import {
  CommitResult,
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
import { parseResultSnapshot } from './ledger.invariants';

const log = createServiceLogger('mongo-ledger-store');

const RESERVE_ATTEMPTS = 3;

export interface MongoLedgerStoreOptions {
  connection?: Connection;
  /** Server-side bound for each query (maxTimeMS) and for the commit */
  operationTimeoutMs: number;
}

export const isDuplicateKeyError = (err: unknown): boolean => {
  return err instanceof mongoose.mongo.MongoServerError && err.code === 11000;
};

class ReservationLost extends Error {}

const toLedgerEntry = (
  doc: Pick<ILedgerEntry, 'accountId' | 'balance' | 'version' | 'createdAt' | 'updatedAt'>
): LedgerEntry => ({
  accountId: doc.accountId,
  balance: doc.balance,
  version: doc.version,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

const toIdempotencyRecord = (doc: IIdempotencyRecord): IdempotencyRecord => {
  if (doc.status === 'PENDING') {
    return {
      status: 'PENDING',
      accountId: doc.accountId,
      idempotencyKey: doc.idempotencyKey,
      reservationId: doc.reservationId,
      fingerprint: doc.fingerprint,
      createdAt: doc.createdAt,
      leaseExpiresAt: doc.leaseExpiresAt,
    };
  }

  const result = parseResultSnapshot(doc.result);
  if (!result) {
    throw new Error(
      `Idempotency record ${doc.accountId}/${doc.idempotencyKey} holds an unreadable result`
    );
  }

  return {
    status: 'COMPLETED',
    accountId: doc.accountId,
    idempotencyKey: doc.idempotencyKey,
    fingerprint: doc.fingerprint,
    result,
    createdAt: doc.createdAt,
    completedAt: doc.completedAt ?? doc.updatedAt,
    expiresAt: doc.expiresAt,
  };
};

const pendingFilter = (ref: ReservationRef) => ({
  accountId: ref.accountId,
  idempotencyKey: ref.idempotencyKey,
  reservationId: ref.reservationId,
  status: 'PENDING' as const,
});

const completionUpdate = (result: ResultSnapshot, completedAt: Date, retentionMs: number) => ({
  $set: {
    status: 'COMPLETED' as const,
    result,
    completedAt,
    expiresAt: new Date(completedAt.getTime() + retentionMs),
  },
});

export class MongoLedgerStore implements LedgerStore {
  private readonly connection: Connection;
  private readonly timeoutMs: number;

  constructor(options: MongoLedgerStoreOptions) {
    this.connection = options.connection ?? mongoose.connection;
    this.timeoutMs = options.operationTimeoutMs;
  }

  async getEntry(accountId: string): Promise<LedgerEntry | null> {
    const doc = await LedgerEntryModel.findOne({ accountId }).maxTimeMS(this.timeoutMs).exec();
    return doc ? toLedgerEntry(doc) : null;
  }

  async createEntry(accountId: string, balance: number, now: Date): Promise<LedgerEntry> {
    try {
      const doc = await LedgerEntryModel.create({
        accountId,
        balance,
        version: 1,
        createdAt: now,
      });
      return toLedgerEntry(doc);
    } catch (err) {
      if (isDuplicateKeyError(err)) {
        throw new AccountAlreadyExistsError(accountId);
      }
      throw err;
    }
  }

  async reserveKey(request: ReserveRequest): Promise<ReserveResult> {
    const leaseExpiresAt = new Date(request.now.getTime() + request.leaseMs);
    const reservation: PendingReservation = {
      status: 'PENDING',
      accountId: request.accountId,
      idempotencyKey: request.idempotencyKey,
      reservationId: request.reservationId,
      fingerprint: request.fingerprint,
      createdAt: request.now,
      leaseExpiresAt,
    };

    for (let attempt = 0; attempt < RESERVE_ATTEMPTS; attempt++) {
      try {
        // Abandoned reservations age out through the TTL index too
        await IdempotencyRecordModel.create({ ...reservation, expiresAt: leaseExpiresAt });
        return { status: 'RESERVED', reservation };
      } catch (err) {
        if (!isDuplicateKeyError(err)) throw err;
      }

      const doc = await IdempotencyRecordModel.findOne({
        accountId: request.accountId,
        idempotencyKey: request.idempotencyKey,
      })
        .maxTimeMS(this.timeoutMs)
        .exec();

      // Purged between our insert and the read; insert again
      if (!doc) continue;

      const existing = toIdempotencyRecord(doc);
      const now = request.now.getTime();
      if (existing.status === 'COMPLETED' && existing.expiresAt.getTime() > now) {
        return { status: 'COMPLETED', record: existing };
      }
      if (existing.status === 'PENDING' && existing.leaseExpiresAt.getTime() > now) {
        return { status: 'PENDING', record: existing };
      }

      // Expired record or abandoned reservation: take it over, but only if
      // nobody else changed it since we read it
      const taken = await IdempotencyRecordModel.findOneAndUpdate(
        {
          accountId: request.accountId,
          idempotencyKey: request.idempotencyKey,
          reservationId: doc.reservationId,
          status: doc.status,
        },
        {
          $set: {
            status: 'PENDING',
            reservationId: request.reservationId,
            fingerprint: request.fingerprint,
            leaseExpiresAt,
            expiresAt: leaseExpiresAt,
          },
          $unset: { result: 1, completedAt: 1 },
        },
        { new: true }
      )
        .maxTimeMS(this.timeoutMs)
        .exec();

      if (taken) {
        log.info(
          { accountId: request.accountId, idempotencyKey: request.idempotencyKey },
          'Took over expired idempotency record'
        );
        return { status: 'RESERVED', reservation };
      }
    }

    throw new Error(
      `Could not reserve idempotency key ${request.idempotencyKey} after ${RESERVE_ATTEMPTS} attempts`
    );
  }

  async getRecord(accountId: string, idempotencyKey: string): Promise<IdempotencyRecord | null> {
    const doc = await IdempotencyRecordModel.findOne({ accountId, idempotencyKey })
      .maxTimeMS(this.timeoutMs)
      .exec();
    return doc ? toIdempotencyRecord(doc) : null;
  }

  async finalizeKey(
    ref: ReservationRef,
    result: ResultSnapshot,
    completedAt: Date,
    retentionMs: number
  ): Promise<boolean> {
    const outcome = await IdempotencyRecordModel.updateOne(
      pendingFilter(ref),
      completionUpdate(result, completedAt, retentionMs)
    ).exec();
    return outcome.modifiedCount === 1;
  }

  async releaseKey(ref: ReservationRef): Promise<void> {
    await IdempotencyRecordModel.deleteOne(pendingFilter(ref)).exec();
  }

  async purgeExpiredKeys(now: Date): Promise<number> {
    const outcome = await IdempotencyRecordModel.deleteMany({
      status: 'COMPLETED',
      expiresAt: { $lte: now },
    }).exec();
    return outcome.deletedCount;
  }

  async commit(mutation: LedgerMutation): Promise<CommitResult> {
    const { reservation } = mutation;

    try {
      return await this.connection.transaction(
        async (session): Promise<CommitResult> => {
          const updated = await LedgerEntryModel.findOneAndUpdate(
            { accountId: reservation.accountId, version: mutation.expectedVersion },
            {
              $set: { balance: mutation.newBalance },
              $inc: { version: 1 },
            },
            { new: true, session, runValidators: true }
          ).exec();

          if (!updated) {
            const current = await LedgerEntryModel.findOne({ accountId: reservation.accountId })
              .session(session)
              .exec();
            return { status: 'CONFLICT', currentVersion: current ? current.version : null };
          }

          const finalized = await IdempotencyRecordModel.updateOne(
            pendingFilter(reservation),
            completionUpdate(mutation.result, mutation.completedAt, mutation.retentionMs),
            { session }
          ).exec();

          // Throwing aborts the transaction, undoing the balance write
          if (finalized.modifiedCount !== 1) {
            throw new ReservationLost();
          }

          return { status: 'COMMITTED', entry: toLedgerEntry(updated) };
        },
        { maxCommitTimeMS: this.timeoutMs }
      );
    } catch (err) {
      if (err instanceof ReservationLost) {
        return { status: 'RESERVATION_LOST' };
      }
      throw err;
    }
  }
}
