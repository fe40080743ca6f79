/**
 * Token bucket state and the pure refill/consume step.
 */

export interface BucketPolicy {
  capacity: number;
  refillRatePerSecond: number;
}

export interface Bucket extends BucketPolicy {
  identity: string;
  tokens: number;
  lastRefillAt: number;
  lastSeenAt: number;
}

export interface ConsumeResult {
  admitted: boolean;
  remaining: number;
  retryAfterMs: number;
}

export const validatePolicy = (policy: BucketPolicy): void => {
  if (!Number.isInteger(policy.capacity) || policy.capacity <= 0) {
    throw new RangeError(`Bucket capacity must be a positive integer, got ${policy.capacity}`);
  }
  if (!Number.isFinite(policy.refillRatePerSecond) || policy.refillRatePerSecond <= 0) {
    throw new RangeError(
      `Bucket refill rate must be positive, got ${policy.refillRatePerSecond}`
    );
  }
};

/**
 * New buckets start full
 */
export const createBucket = (identity: string, policy: BucketPolicy, now: number): Bucket => ({
  identity,
  capacity: policy.capacity,
  refillRatePerSecond: policy.refillRatePerSecond,
  tokens: policy.capacity,
  lastRefillAt: now,
  lastSeenAt: now,
});

/**
 * Credit tokens for the time since the last refill. A clock reading older
 * than lastRefillAt credits nothing and leaves lastRefillAt where it was.
 */
export const refill = (bucket: Bucket, now: number): void => {
  const elapsedMs = Math.max(0, now - bucket.lastRefillAt);
  bucket.tokens = Math.min(
    bucket.capacity,
    bucket.tokens + (elapsedMs / 1000) * bucket.refillRatePerSecond
  );
  bucket.lastRefillAt = Math.max(bucket.lastRefillAt, now);
};

/**
 * Whether the bucket would be back at capacity by now. Only such buckets may
 * be dropped, since a recreated bucket starts full.
 */
export const isRefilledAt = (bucket: Bucket, now: number): boolean => {
  const projected = { ...bucket };
  refill(projected, now);
  return projected.tokens >= projected.capacity;
};

/**
 * Refill then spend one token. Synchronous, so no other caller can observe
 * the bucket between the two steps.
 */
export const consume = (bucket: Bucket, now: number): ConsumeResult => {
  refill(bucket, now);
  bucket.lastSeenAt = now;

  if (bucket.tokens >= 1) {
    bucket.tokens -= 1;
    return { admitted: true, remaining: bucket.tokens, retryAfterMs: 0 };
  }

  return {
    admitted: false,
    remaining: bucket.tokens,
    retryAfterMs: Math.ceil(((1 - bucket.tokens) / bucket.refillRatePerSecond) * 1000),
  };
};

/**
 * Apply a changed policy to an existing bucket without minting tokens
 */
export const applyPolicy = (bucket: Bucket, policy: BucketPolicy): void => {
  bucket.capacity = policy.capacity;
  bucket.refillRatePerSecond = policy.refillRatePerSecond;
  bucket.tokens = Math.min(bucket.tokens, policy.capacity);
};
