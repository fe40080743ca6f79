/**
 * Wires the ledger components together. Backends come from config unless
 * the caller passes them in (tests pass in-memory stores and a manual clock).
 */

import { config } from './config';
import { getRedisClient } from './config/redis';
import { createServiceLogger } from './observability';
import { AdmissionConfig, AdmissionController, BucketStore, MemoryBucketStore, RedisBucketStore } from './services/admission';
import { IdempotencyConfig, IdempotencyService } from './services/idempotency';
import { MemoryLedgerStore, MongoLedgerStore } from './services/ledger';
import { TransactionService } from './services/transaction';
import { LedgerStore } from './types/ledger';
import { Clock, monotonicClock } from './utils/clock';

const log = createServiceLogger('core');

export interface LedgerCoreOptions {
  store?: LedgerStore;
  bucketStore?: BucketStore;
  clock?: Clock;
  admission?: Partial<AdmissionConfig>;
  idempotency?: Partial<IdempotencyConfig>;
  writeTimeoutMs?: number;
  /** How often completed idempotency records past retention are purged */
  purgeIntervalMs?: number;
}

export interface LedgerCore {
  store: LedgerStore;
  admission: AdmissionController;
  idempotency: IdempotencyService;
  transactions: TransactionService;
  /** Start the background sweeps */
  start(): void;
  stop(): void;
}

const createLedgerStore = (writeTimeoutMs: number): LedgerStore => {
  if (config.backends.ledgerStore === 'mongo') {
    return new MongoLedgerStore({ operationTimeoutMs: writeTimeoutMs });
  }
  return new MemoryLedgerStore();
};

const createBucketStore = (idleEvictionMs: number): BucketStore => {
  if (config.backends.admission === 'redis') {
    return new RedisBucketStore(getRedisClient(), idleEvictionMs);
  }
  return new MemoryBucketStore();
};

export const createLedgerCore = (options: LedgerCoreOptions = {}): LedgerCore => {
  const clock = options.clock ?? monotonicClock;
  const writeTimeoutMs = options.writeTimeoutMs ?? config.ledger.writeTimeoutMs;

  const admissionConfig: AdmissionConfig = {
    classes: config.rateLimit.classes,
    idleEvictionMs: config.rateLimit.idleEvictionMs,
    sweepIntervalMs: config.rateLimit.sweepIntervalMs,
    ...options.admission,
  };

  const idempotencyConfig: IdempotencyConfig = {
    retentionMs: config.ledger.idempotencyRetentionMs,
    leaseMs: config.ledger.idempotencyLeaseMs,
    waitTimeoutMs: config.ledger.idempotencyWaitMs,
    pollIntervalMs: config.ledger.idempotencyPollMs,
    ...options.idempotency,
  };

  const store = options.store ?? createLedgerStore(writeTimeoutMs);
  const admission = new AdmissionController(admissionConfig, {
    store: options.bucketStore ?? createBucketStore(admissionConfig.idleEvictionMs),
    clock,
  });
  const idempotency = new IdempotencyService(store, idempotencyConfig, clock);
  const transactions = new TransactionService({
    store,
    admission,
    idempotency,
    clock,
    writeTimeoutMs,
    idempotencyWaitMs: idempotencyConfig.waitTimeoutMs,
  });

  const purgeIntervalMs = options.purgeIntervalMs ?? config.ledger.purgeIntervalMs;

  return {
    store,
    admission,
    idempotency,
    transactions,
    start: () => {
      admission.start();
      idempotency.start(purgeIntervalMs);
      log.info(
        {
          ledgerStore: store.constructor.name,
          sweepIntervalMs: admissionConfig.sweepIntervalMs,
          purgeIntervalMs,
        },
        'Ledger background tasks started'
      );
    },
    stop: () => {
      admission.stop();
      idempotency.stop();
    },
  };
};
