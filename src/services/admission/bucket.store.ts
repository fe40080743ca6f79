import {
  Bucket,
  BucketPolicy,
  ConsumeResult,
  applyPolicy,
  consume,
  createBucket,
  isRefilledAt,
} from './bucket';

/**
 * Where bucket state lives. take() must refill and consume as one atomic
 * step per identity; different identities never contend.
 */
export interface BucketStore {
  take(identity: string, policy: BucketPolicy, now: number): Promise<ConsumeResult>;
  /**
   * Remove buckets not touched since now - idleMs that have refilled to
   * capacity; resolves the count removed
   */
  evictIdle(now: number, idleMs: number): Promise<number>;
  size(): number | null;
}

/**
 * Process-local buckets. Each take() runs to completion on the event loop
 * before any other caller can touch the same bucket, which makes it the
 * per-identity critical section.
 */
export class MemoryBucketStore implements BucketStore {
  private readonly buckets = new Map<string, Bucket>();

  async take(identity: string, policy: BucketPolicy, now: number): Promise<ConsumeResult> {
    return this.takeSync(identity, policy, now);
  }

  takeSync(identity: string, policy: BucketPolicy, now: number): ConsumeResult {
    let bucket = this.buckets.get(identity);
    if (!bucket) {
      bucket = createBucket(identity, policy, now);
      this.buckets.set(identity, bucket);
    } else if (
      bucket.capacity !== policy.capacity ||
      bucket.refillRatePerSecond !== policy.refillRatePerSecond
    ) {
      applyPolicy(bucket, policy);
    }
    return consume(bucket, now);
  }

  async evictIdle(now: number, idleMs: number): Promise<number> {
    let evicted = 0;
    for (const [identity, bucket] of this.buckets) {
      if (now - bucket.lastSeenAt >= idleMs && isRefilledAt(bucket, now)) {
        this.buckets.delete(identity);
        evicted++;
      }
    }
    return evicted;
  }

  /** Snapshot of one bucket, for diagnostics */
  peek(identity: string): Readonly<Bucket> | undefined {
    const bucket = this.buckets.get(identity);
    return bucket ? { ...bucket } : undefined;
  }

  size(): number {
    return this.buckets.size;
  }
}
