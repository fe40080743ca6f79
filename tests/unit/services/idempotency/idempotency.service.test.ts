/**
 * Unit tests for the Idempotency Store service
 */

import { IdempotencyService, buildFingerprint, CheckOutcome } from '../../../../src/services/idempotency';
import { MemoryLedgerStore } from '../../../../src/services/ledger';
import { ResultSnapshot } from '../../../../src/types/ledger';
import { ManualClock } from '../../../../src/utils/clock';

const success: ResultSnapshot = {
  outcome: 'SUCCESS',
  receipt: {
    accountId: 'acct-1',
    operationType: 'debit',
    amount: 100,
    newBalance: 900,
    newVersion: 2,
    timestamp: '2024-01-01T00:00:00.000Z',
  },
};

const config = {
  retentionMs: 60_000,
  leaseMs: 30_000,
  waitTimeoutMs: 5000,
  pollIntervalMs: 1000,
};

const sequentialIds = (prefix: string) => {
  let next = 0;
  return () => `${prefix}-${++next}`;
};

const expectFresh = (outcome: CheckOutcome) => {
  if (outcome.status !== 'FRESH') {
    throw new Error(`expected FRESH, got ${outcome.status}`);
  }
  return outcome.reservation;
};

describe('IdempotencyService', () => {
  const fingerprint = buildFingerprint('debit', 10000);
  let store: MemoryLedgerStore;
  let clock: ManualClock;
  let service: IdempotencyService;

  beforeEach(() => {
    store = new MemoryLedgerStore();
    clock = new ManualClock();
    service = new IdempotencyService(store, config, clock, sequentialIds('res'));
  });

  afterEach(() => {
    service.stop();
  });

  describe('buildFingerprint', () => {
    it('should combine operation and minor-unit amount', () => {
      expect(buildFingerprint('credit', 2550)).toBe('credit:2550');
    });
  });

  describe('checkOrReserve', () => {
    it('should reserve an unseen key', async () => {
      const outcome = await service.checkOrReserve('acct-1', 'key-1', fingerprint);

      expect(outcome).toEqual({
        status: 'FRESH',
        reservation: expect.objectContaining({
          accountId: 'acct-1',
          idempotencyKey: 'key-1',
          reservationId: 'res-1',
        }),
      });
    });

    it('should replay a completed record', async () => {
      const reservation = expectFresh(await service.checkOrReserve('acct-1', 'key-1', fingerprint));
      await service.finalize(reservation, success);

      const outcome = await service.checkOrReserve('acct-1', 'key-1', fingerprint);

      expect(outcome.status).toBe('DUPLICATE');
      if (outcome.status === 'DUPLICATE') {
        expect(outcome.record.result).toEqual(success);
      }
    });

    it('should flag a key reused with a different amount', async () => {
      const reservation = expectFresh(await service.checkOrReserve('acct-1', 'key-1', fingerprint));
      await service.finalize(reservation, success);

      const outcome = await service.checkOrReserve('acct-1', 'key-1', buildFingerprint('debit', 20000));

      expect(outcome.status).toBe('MISMATCH');
    });

    it('should flag a mismatch against a pending reservation without waiting', async () => {
      expectFresh(await service.checkOrReserve('acct-1', 'key-1', fingerprint));

      const outcome = await service.checkOrReserve('acct-1', 'key-1', buildFingerprint('credit', 10000));

      expect(outcome.status).toBe('MISMATCH');
    });

    it('should wake a concurrent duplicate when the owner finalizes', async () => {
      const reservation = expectFresh(await service.checkOrReserve('acct-1', 'key-1', fingerprint));

      const duplicate = service.checkOrReserve('acct-1', 'key-1', fingerprint);
      await service.finalize(reservation, success);

      const outcome = await duplicate;
      expect(outcome.status).toBe('DUPLICATE');
    });

    it('should hand the key to a concurrent duplicate when the owner releases', async () => {
      const reservation = expectFresh(await service.checkOrReserve('acct-1', 'key-1', fingerprint));

      const duplicate = service.checkOrReserve('acct-1', 'key-1', fingerprint);
      await service.release(reservation);

      const outcome = await duplicate;
      expect(outcome.status).toBe('FRESH');
    });

    it('should give up with IN_PROGRESS after the wait timeout', async () => {
      const impatient = new IdempotencyService(
        store,
        { ...config, waitTimeoutMs: 20, pollIntervalMs: 10 },
        clock,
        sequentialIds('other')
      );
      expectFresh(await service.checkOrReserve('acct-1', 'key-1', fingerprint));

      const outcome = await impatient.checkOrReserve('acct-1', 'key-1', fingerprint);

      expect(outcome).toEqual({ status: 'IN_PROGRESS' });
    });

    it('should poll the store when the owner lives in another process', async () => {
      const otherProcess = new IdempotencyService(
        store,
        { ...config, pollIntervalMs: 10 },
        clock,
        sequentialIds('other')
      );
      const reservation = expectFresh(await service.checkOrReserve('acct-1', 'key-1', fingerprint));

      const duplicate = otherProcess.checkOrReserve('acct-1', 'key-1', fingerprint);
      await service.finalize(reservation, success);

      expect((await duplicate).status).toBe('DUPLICATE');
    });

    it('should let a retry take over a reservation whose lease expired', async () => {
      expectFresh(await service.checkOrReserve('acct-1', 'key-1', fingerprint));
      clock.advance(config.leaseMs);

      const outcome = await service.checkOrReserve('acct-1', 'key-1', fingerprint);

      expect(expectFresh(outcome).reservationId).toBe('res-2');
    });

    it('should treat keys on different accounts independently', async () => {
      expectFresh(await service.checkOrReserve('acct-1', 'key-1', fingerprint));

      const outcome = await service.checkOrReserve('acct-2', 'key-1', fingerprint);

      expect(outcome.status).toBe('FRESH');
    });
  });

  describe('finalize', () => {
    it('should report false when the reservation was taken over', async () => {
      const stale = expectFresh(await service.checkOrReserve('acct-1', 'key-1', fingerprint));
      clock.advance(config.leaseMs);
      expectFresh(await service.checkOrReserve('acct-1', 'key-1', fingerprint));

      expect(await service.finalize(stale, success)).toBe(false);
    });

    it('should keep the record for the retention window', async () => {
      const reservation = expectFresh(await service.checkOrReserve('acct-1', 'key-1', fingerprint));
      await service.finalize(reservation, success);

      expect(await store.getRecord('acct-1', 'key-1')).toMatchObject({
        status: 'COMPLETED',
        expiresAt: new Date(clock.now() + config.retentionMs),
      });
    });
  });

  describe('purgeExpired', () => {
    it('should drop completed records past retention', async () => {
      const reservation = expectFresh(await service.checkOrReserve('acct-1', 'key-1', fingerprint));
      await service.finalize(reservation, success);
      clock.advance(config.retentionMs);

      expect(await service.purgeExpired()).toBe(1);
      expect(await store.getRecord('acct-1', 'key-1')).toBeNull();
    });

    it('should let the key be reused after purge', async () => {
      const reservation = expectFresh(await service.checkOrReserve('acct-1', 'key-1', fingerprint));
      await service.finalize(reservation, success);
      clock.advance(config.retentionMs);
      await service.purgeExpired();

      const outcome = await service.checkOrReserve('acct-1', 'key-1', buildFingerprint('credit', 1));

      expect(outcome.status).toBe('FRESH');
    });
  });
});
