/**
 * Idempotency Store
 *
 * Turns caller-supplied idempotency keys into at-most-once effects.
 *
 * - A fresh key is reserved (PENDING) before any ledger work starts
 * - A second request carrying the same key waits for the first one to
 *   finish and then replays its stored result
 * - Deterministic outcomes are finalized into a COMPLETED record
 * - Retryable failures release the reservation so the retry can proceed
 *
 * Keys are scoped per account. Waiting is per (account, key); unrelated
 * keys never wait on each other.
 */

import { v4 as uuid } from 'uuid';

import { Clock, monotonicClock } from '../../utils/clock';
import { sleep } from '../../utils/timeout';
import { createServiceLogger, idempotencyReplaysTotal } from '../../observability';
import {
  CompletedRecord,
  IdempotencyRecord,
  LedgerStore,
  OperationType,
  ReservationRef,
  ResultSnapshot,
} from '../../types/ledger';

const log = createServiceLogger('idempotency');

export interface IdempotencyConfig {
  retentionMs: number;
  leaseMs: number;
  waitTimeoutMs: number;
  pollIntervalMs: number;
}

export type CheckOutcome =
  | { status: 'FRESH'; reservation: ReservationRef }
  | { status: 'DUPLICATE'; record: CompletedRecord }
  | { status: 'MISMATCH'; record: IdempotencyRecord }
  | { status: 'IN_PROGRESS' };

interface InFlight {
  reservationId: string;
  done: Promise<void>;
  settle: () => void;
}

/**
 * Requests sharing a key must also share operation and amount
 */
export const buildFingerprint = (operationType: OperationType, amountMinor: number): string => {
  return `${operationType}:${amountMinor}`;
};

const inFlightKey = (accountId: string, idempotencyKey: string): string =>
  `${accountId}\u0000${idempotencyKey}`;

export class IdempotencyService {
  private readonly inFlight = new Map<string, InFlight>();
  private purgeTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly store: LedgerStore,
    private readonly config: IdempotencyConfig,
    private readonly clock: Clock = monotonicClock,
    private readonly newReservationId: () => string = uuid
  ) {}

  get retentionMs(): number {
    return this.config.retentionMs;
  }

  /**
   * Reserve the key, or report what already holds it. Blocks for up to
   * waitTimeoutMs while another request owns the key.
   */
  async checkOrReserve(
    accountId: string,
    idempotencyKey: string,
    fingerprint: string
  ): Promise<CheckOutcome> {
    const attempts = Math.max(1, Math.ceil(this.config.waitTimeoutMs / this.config.pollIntervalMs)) + 1;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      const result = await this.store.reserveKey({
        accountId,
        idempotencyKey,
        reservationId: this.newReservationId(),
        fingerprint,
        now: new Date(this.clock.now()),
        leaseMs: this.config.leaseMs,
      });

      if (result.status === 'RESERVED') {
        this.track(result.reservation);
        return { status: 'FRESH', reservation: result.reservation };
      }

      if (result.record.fingerprint !== fingerprint) {
        log.info({ accountId, idempotencyKey }, 'Idempotency key reused with a different request');
        return { status: 'MISMATCH', record: result.record };
      }

      if (result.status === 'COMPLETED') {
        idempotencyReplaysTotal.inc();
        log.debug({ accountId, idempotencyKey }, 'Replaying stored result');
        return { status: 'DUPLICATE', record: result.record };
      }

      if (attempt < attempts) {
        await this.waitForOwner(accountId, idempotencyKey);
      }
    }

    log.info({ accountId, idempotencyKey }, 'Gave up waiting for in-flight request');
    return { status: 'IN_PROGRESS' };
  }

  /**
   * Record a deterministic outcome. Resolves false if the reservation had
   * already been lost, in which case nothing was written.
   */
  async finalize(reservation: ReservationRef, result: ResultSnapshot): Promise<boolean> {
    try {
      return await this.store.finalizeKey(
        reservation,
        result,
        new Date(this.clock.now()),
        this.config.retentionMs
      );
    } finally {
      this.settle(reservation);
    }
  }

  /**
   * Give the key back so a retry can run
   */
  async release(reservation: ReservationRef): Promise<void> {
    try {
      await this.store.releaseKey(reservation);
    } finally {
      this.settle(reservation);
    }
  }

  /**
   * Wake local waiters once the reservation is finalized or released
   * elsewhere (the ledger commit finalizes it in the same write)
   */
  settle(reservation: ReservationRef): void {
    const key = inFlightKey(reservation.accountId, reservation.idempotencyKey);
    const entry = this.inFlight.get(key);
    if (entry && entry.reservationId === reservation.reservationId) {
      this.inFlight.delete(key);
      entry.settle();
    }
  }

  async purgeExpired(): Promise<number> {
    const purged = await this.store.purgeExpiredKeys(new Date(this.clock.now()));
    if (purged > 0) {
      log.debug({ purged }, 'Purged expired idempotency records');
    }
    return purged;
  }

  start(intervalMs: number): void {
    if (this.purgeTimer) return;

    this.purgeTimer = setInterval(() => {
      this.purgeExpired().catch((err: unknown) => {
        log.error({ err }, 'Idempotency purge failed');
      });
    }, intervalMs);
    this.purgeTimer.unref();
  }

  stop(): void {
    if (this.purgeTimer) {
      clearInterval(this.purgeTimer);
      this.purgeTimer = null;
    }
  }

  private track(reservation: ReservationRef): void {
    let settle: () => void = () => undefined;
    const done = new Promise<void>((resolve) => {
      settle = resolve;
    });
    this.inFlight.set(inFlightKey(reservation.accountId, reservation.idempotencyKey), {
      reservationId: reservation.reservationId,
      done,
      settle,
    });
  }

  /**
   * Same-process owners signal completion directly; owners in other
   * processes are polled
   */
  private async waitForOwner(accountId: string, idempotencyKey: string): Promise<void> {
    const owner = this.inFlight.get(inFlightKey(accountId, idempotencyKey));
    if (!owner) {
      await sleep(this.config.pollIntervalMs);
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const pollDelay = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, this.config.pollIntervalMs);
    });
    await Promise.race([owner.done, pollDelay]);
    clearTimeout(timer);
  }
}
