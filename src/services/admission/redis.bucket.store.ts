/**
 * Redis-backed token buckets
 *
 * Shares buckets across every API instance. The refill and the consume run
 * inside one Lua script, which Redis executes atomically, so two instances
 * admitting the same identity never spend the same fractional token.
 * Idle buckets expire through PEXPIRE instead of a sweep, never before they
 * would have refilled to capacity.
 */

import { BucketPolicy, ConsumeResult } from './bucket';
import { BucketStore } from './bucket.store';

/**
 * The slice of the ioredis client this store needs
 */
export interface ScriptClient {
  eval(script: string, numkeys: number, ...args: (string | number)[]): Promise<unknown>;
}

const TOKEN_BUCKET_SCRIPT = `
local capacity = tonumber(ARGV[1])
local rate = tonumber(ARGV[2])
local now = tonumber(ARGV[3])
local idle_ms = tonumber(ARGV[4])

local state = redis.call('HMGET', KEYS[1], 'tokens', 'ts')
local tokens = tonumber(state[1])
local ts = tonumber(state[2])
if tokens == nil or ts == nil then
  tokens = capacity
  ts = now
end

local elapsed = now - ts
if elapsed < 0 then elapsed = 0 end
tokens = math.min(capacity, tokens + (elapsed / 1000) * rate)
if now > ts then ts = now end

local admitted = 0
local retry_after = 0
if tokens >= 1 then
  tokens = tokens - 1
  admitted = 1
else
  retry_after = math.ceil(((1 - tokens) / rate) * 1000)
end

redis.call('HSET', KEYS[1], 'tokens', tostring(tokens), 'ts', tostring(ts))
local ttl = math.ceil(((capacity - tokens) / rate) * 1000)
if ttl < idle_ms then ttl = idle_ms end
redis.call('PEXPIRE', KEYS[1], ttl)
return { admitted, tostring(tokens), retry_after }
`;

export class RedisBucketStore implements BucketStore {
  constructor(
    private readonly client: ScriptClient,
    private readonly idleMs: number,
    private readonly keyPrefix = 'bucket:'
  ) {}

  async take(identity: string, policy: BucketPolicy, now: number): Promise<ConsumeResult> {
    const reply = await this.client.eval(
      TOKEN_BUCKET_SCRIPT,
      1,
      `${this.keyPrefix}${identity}`,
      policy.capacity,
      policy.refillRatePerSecond,
      Math.floor(now),
      this.idleMs
    );
    return parseReply(reply);
  }

  // Keys carry their own TTL
  async evictIdle(): Promise<number> {
    return 0;
  }

  size(): null {
    return null;
  }
}

const parseReply = (reply: unknown): ConsumeResult => {
  if (!Array.isArray(reply) || reply.length !== 3) {
    throw new Error(`Unexpected token bucket reply: ${JSON.stringify(reply)}`);
  }
  const [admitted, tokens, retryAfterMs] = reply;
  const remaining = Number(tokens);
  if (typeof admitted !== 'number' || typeof retryAfterMs !== 'number' || Number.isNaN(remaining)) {
    throw new Error(`Unexpected token bucket reply: ${JSON.stringify(reply)}`);
  }
  return { admitted: admitted === 1, remaining, retryAfterMs };
};
