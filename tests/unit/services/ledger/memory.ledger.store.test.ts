/**
 * Unit tests for the in-process LedgerStore
 */

import { AccountAlreadyExistsError, MemoryLedgerStore } from '../../../../src/services/ledger';
import { LedgerMutation, ReserveRequest, ResultSnapshot } from '../../../../src/types/ledger';

const NOW = new Date('2024-01-01T00:00:00.000Z');
const later = (ms: number): Date => new Date(NOW.getTime() + ms);

const reserveRequest = (overrides: Partial<ReserveRequest> = {}): ReserveRequest => ({
  accountId: 'acct-1',
  idempotencyKey: 'key-1',
  reservationId: 'res-1',
  fingerprint: 'debit:10000',
  now: NOW,
  leaseMs: 30_000,
  ...overrides,
});

const success: ResultSnapshot = {
  outcome: 'SUCCESS',
  receipt: {
    accountId: 'acct-1',
    operationType: 'debit',
    amount: 100,
    newBalance: 900,
    newVersion: 2,
    timestamp: NOW.toISOString(),
  },
};

const mutation = (overrides: Partial<LedgerMutation> = {}): LedgerMutation => ({
  reservation: { accountId: 'acct-1', idempotencyKey: 'key-1', reservationId: 'res-1' },
  expectedVersion: 1,
  newBalance: 90000,
  result: success,
  completedAt: later(10),
  retentionMs: 60_000,
  ...overrides,
});

describe('MemoryLedgerStore', () => {
  let store: MemoryLedgerStore;

  beforeEach(async () => {
    store = new MemoryLedgerStore();
    await store.createEntry('acct-1', 100000, NOW);
  });

  describe('entries', () => {
    it('should create an entry at version 1', async () => {
      const entry = await store.getEntry('acct-1');

      expect(entry).toEqual({
        accountId: 'acct-1',
        balance: 100000,
        version: 1,
        createdAt: NOW,
        updatedAt: NOW,
      });
    });

    it('should refuse to create an existing account', async () => {
      await expect(store.createEntry('acct-1', 0, NOW)).rejects.toBeInstanceOf(AccountAlreadyExistsError);
    });

    it('should return null for an unknown account', async () => {
      expect(await store.getEntry('acct-missing')).toBeNull();
    });

    it('should hand out copies', async () => {
      const entry = await store.getEntry('acct-1');
      if (!entry) throw new Error('entry missing');
      entry.balance = 1;

      expect((await store.getEntry('acct-1'))?.balance).toBe(100000);
    });
  });

  describe('reserveKey', () => {
    it('should reserve an unseen key', async () => {
      const result = await store.reserveKey(reserveRequest());

      expect(result).toEqual({
        status: 'RESERVED',
        reservation: {
          status: 'PENDING',
          accountId: 'acct-1',
          idempotencyKey: 'key-1',
          reservationId: 'res-1',
          fingerprint: 'debit:10000',
          createdAt: NOW,
          leaseExpiresAt: later(30_000),
        },
      });
    });

    it('should report a live reservation as pending', async () => {
      await store.reserveKey(reserveRequest());

      const result = await store.reserveKey(reserveRequest({ reservationId: 'res-2', now: later(1000) }));

      expect(result.status).toBe('PENDING');
    });

    it('should let a retry take over an expired lease', async () => {
      await store.reserveKey(reserveRequest());

      const result = await store.reserveKey(reserveRequest({ reservationId: 'res-2', now: later(30_000) }));

      expect(result.status).toBe('RESERVED');
      expect((await store.getRecord('acct-1', 'key-1'))?.status).toBe('PENDING');
    });

    it('should scope keys per account', async () => {
      await store.reserveKey(reserveRequest());

      const result = await store.reserveKey(reserveRequest({ accountId: 'acct-2', reservationId: 'res-2' }));

      expect(result.status).toBe('RESERVED');
    });

    it('should return a completed record within retention', async () => {
      await store.reserveKey(reserveRequest());
      await store.finalizeKey({ accountId: 'acct-1', idempotencyKey: 'key-1', reservationId: 'res-1' }, success, NOW, 60_000);

      const result = await store.reserveKey(reserveRequest({ reservationId: 'res-2', now: later(59_999) }));

      expect(result.status).toBe('COMPLETED');
    });

    it('should reserve again once retention has passed', async () => {
      await store.reserveKey(reserveRequest());
      await store.finalizeKey({ accountId: 'acct-1', idempotencyKey: 'key-1', reservationId: 'res-1' }, success, NOW, 60_000);

      const result = await store.reserveKey(reserveRequest({ reservationId: 'res-2', now: later(60_000) }));

      expect(result.status).toBe('RESERVED');
    });
  });

  describe('finalizeKey / releaseKey', () => {
    const ref = { accountId: 'acct-1', idempotencyKey: 'key-1', reservationId: 'res-1' };

    it('should complete a held reservation', async () => {
      await store.reserveKey(reserveRequest());

      expect(await store.finalizeKey(ref, success, NOW, 60_000)).toBe(true);
      expect(await store.getRecord('acct-1', 'key-1')).toEqual({
        status: 'COMPLETED',
        accountId: 'acct-1',
        idempotencyKey: 'key-1',
        fingerprint: 'debit:10000',
        result: success,
        createdAt: NOW,
        completedAt: NOW,
        expiresAt: later(60_000),
      });
    });

    it('should not finalize a reservation it no longer holds', async () => {
      await store.reserveKey(reserveRequest());
      await store.reserveKey(reserveRequest({ reservationId: 'res-2', now: later(30_000) }));

      expect(await store.finalizeKey(ref, success, NOW, 60_000)).toBe(false);
    });

    it('should delete a held reservation on release', async () => {
      await store.reserveKey(reserveRequest());

      await store.releaseKey(ref);

      expect(await store.getRecord('acct-1', 'key-1')).toBeNull();
    });

    it('should leave a taken-over reservation alone on release', async () => {
      await store.reserveKey(reserveRequest());
      await store.reserveKey(reserveRequest({ reservationId: 'res-2', now: later(30_000) }));

      await store.releaseKey(ref);

      expect(await store.getRecord('acct-1', 'key-1')).toMatchObject({ reservationId: 'res-2' });
    });

    it('should never release a completed record', async () => {
      await store.reserveKey(reserveRequest());
      await store.finalizeKey(ref, success, NOW, 60_000);

      await store.releaseKey(ref);

      expect((await store.getRecord('acct-1', 'key-1'))?.status).toBe('COMPLETED');
    });
  });

  describe('purgeExpiredKeys', () => {
    it('should remove completed records past retention only', async () => {
      await store.reserveKey(reserveRequest());
      await store.finalizeKey(
        { accountId: 'acct-1', idempotencyKey: 'key-1', reservationId: 'res-1' },
        success,
        NOW,
        1000
      );
      await store.reserveKey(reserveRequest({ idempotencyKey: 'key-2', reservationId: 'res-2' }));

      expect(await store.purgeExpiredKeys(later(1000))).toBe(1);
      expect(await store.getRecord('acct-1', 'key-1')).toBeNull();
      expect((await store.getRecord('acct-1', 'key-2'))?.status).toBe('PENDING');
    });
  });

  describe('commit', () => {
    beforeEach(async () => {
      await store.reserveKey(reserveRequest());
    });

    it('should write balance and version and complete the reservation together', async () => {
      const result = await store.commit(mutation());

      expect(result).toEqual({
        status: 'COMMITTED',
        entry: {
          accountId: 'acct-1',
          balance: 90000,
          version: 2,
          createdAt: NOW,
          updatedAt: later(10),
        },
      });
      expect(await store.getRecord('acct-1', 'key-1')).toMatchObject({
        status: 'COMPLETED',
        result: success,
        expiresAt: later(60_010),
      });
    });

    it('should report a conflict when the version has moved', async () => {
      const result = await store.commit(mutation({ expectedVersion: 3 }));

      expect(result).toEqual({ status: 'CONFLICT', currentVersion: 1 });
      expect((await store.getEntry('acct-1'))?.balance).toBe(100000);
      expect((await store.getRecord('acct-1', 'key-1'))?.status).toBe('PENDING');
    });

    it('should report a conflict with no version for a missing account', async () => {
      const result = await store.commit(
        mutation({ reservation: { accountId: 'acct-gone', idempotencyKey: 'key-1', reservationId: 'res-1' } })
      );

      expect(result).toEqual({ status: 'CONFLICT', currentVersion: null });
    });

    it('should write nothing once the reservation is lost', async () => {
      await store.reserveKey(reserveRequest({ reservationId: 'res-2', now: later(30_000) }));

      const result = await store.commit(mutation());

      expect(result).toEqual({ status: 'RESERVATION_LOST' });
      expect(await store.getEntry('acct-1')).toMatchObject({ balance: 100000, version: 1 });
    });

    it('should let exactly one of two commits at the same version win', async () => {
      await store.reserveKey(reserveRequest({ idempotencyKey: 'key-2', reservationId: 'res-2' }));

      const [first, second] = await Promise.all([
        store.commit(mutation()),
        store.commit(
          mutation({
            reservation: { accountId: 'acct-1', idempotencyKey: 'key-2', reservationId: 'res-2' },
            newBalance: 80000,
          })
        ),
      ]);

      expect(first.status).toBe('COMMITTED');
      expect(second).toEqual({ status: 'CONFLICT', currentVersion: 2 });
      expect(await store.getEntry('acct-1')).toMatchObject({ balance: 90000, version: 2 });
    });
  });

  describe('forceEntry', () => {
    it('should overwrite the row without checks', async () => {
      store.forceEntry({ accountId: 'acct-1', balance: -5, version: 9, createdAt: NOW, updatedAt: NOW });

      expect(await store.getEntry('acct-1')).toMatchObject({ balance: -5, version: 9 });
    });
  });
});
