/**
 * Admission Controller
 *
 * Decides, per calling identity, whether a mutation request may proceed.
 * Each identity class gets its own token bucket policy; buckets are created
 * lazily and dropped after an idle window. A rejection is a normal outcome
 * and never touches the ledger.
 */

import { Clock, monotonicClock } from '../../utils/clock';
import {
  activeBuckets,
  admissionDecisionsTotal,
  bucketsEvictedTotal,
  createServiceLogger,
} from '../../observability';
import { BucketPolicy, validatePolicy } from './bucket';
import { BucketStore, MemoryBucketStore } from './bucket.store';

const log = createServiceLogger('admission');

export type IdentityClass = 'anonymous' | 'authenticated' | 'service';

export type IdentityClassifier = (identity: string) => IdentityClass;

export interface AdmissionConfig {
  classes: Record<IdentityClass, BucketPolicy>;
  idleEvictionMs: number;
  sweepIntervalMs: number;
}

export interface AdmissionDecision {
  admitted: boolean;
  identityClass: IdentityClass;
  remaining: number;
  retryAfterMs: number;
}

/**
 * anon:* callers are anonymous, svc:* are service accounts, anything else
 * is an authenticated end user
 */
export const classifyIdentity: IdentityClassifier = (identity) => {
  if (identity.startsWith('anon:')) return 'anonymous';
  if (identity.startsWith('svc:')) return 'service';
  return 'authenticated';
};

export interface AdmissionControllerOptions {
  store?: BucketStore;
  clock?: Clock;
  classify?: IdentityClassifier;
}

export class AdmissionController {
  private readonly store: BucketStore;
  private readonly clock: Clock;
  private readonly classify: IdentityClassifier;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly config: AdmissionConfig,
    options: AdmissionControllerOptions = {}
  ) {
    Object.values(config.classes).forEach(validatePolicy);
    this.store = options.store ?? new MemoryBucketStore();
    this.clock = options.clock ?? monotonicClock;
    this.classify = options.classify ?? classifyIdentity;
  }

  /**
   * Spend one permit for identity, if one is available
   */
  async tryAdmit(identity: string): Promise<AdmissionDecision> {
    const identityClass = this.classify(identity);
    const policy = this.config.classes[identityClass];

    const result = await this.store.take(identity, policy, this.clock.now());

    admissionDecisionsTotal.inc({
      identity_class: identityClass,
      outcome: result.admitted ? 'admitted' : 'throttled',
    });

    if (!result.admitted) {
      log.debug(
        { identity, identityClass, retryAfterMs: result.retryAfterMs },
        'Request throttled'
      );
    }

    return { identityClass, ...result };
  }

  policyFor(identity: string): BucketPolicy {
    return this.config.classes[this.classify(identity)];
  }

  /**
   * Drop buckets idle for longer than the eviction window. Safe at any time:
   * a recreated bucket starts full, which is what the old one would have
   * refilled to.
   */
  async sweep(): Promise<number> {
    const evicted = await this.store.evictIdle(this.clock.now(), this.config.idleEvictionMs);

    if (evicted > 0) {
      bucketsEvictedTotal.inc(evicted);
      log.debug({ evicted }, 'Evicted idle buckets');
    }

    const size = this.store.size();
    if (size !== null) {
      activeBuckets.set(size);
    }

    return evicted;
  }

  start(): void {
    if (this.sweepTimer) return;

    this.sweepTimer = setInterval(() => {
      this.sweep().catch((err: unknown) => {
        log.error({ err }, 'Bucket eviction sweep failed');
      });
    }, this.config.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}
