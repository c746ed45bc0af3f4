/**
 * IP Token Bucket Limiter
 *
 * Each client IP owns a bucket of `capacity` tokens refilled continuously
 * at `refillPerHour`. A request consumes one token; tokens are fractional
 * between requests. State lives in a hash `{ tokens, last_update }`.
 */

import { systemClock, toTtlSeconds, type Clock, type KeyValueStore } from '../../infrastructure/store';
import { rateLimitKeys, toEpochSeconds } from './keys';
import type { RateLimitPolicyRegistry } from './policies';
import type { IpStageResult } from './types';

const SECONDS_PER_HOUR = 3600;

function parseStored(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

export class IpTokenBucketLimiter {
  constructor(
    private readonly store: KeyValueStore,
    private readonly policies: RateLimitPolicyRegistry,
    private readonly clock: Clock = systemClock
  ) {}

  async check(subject: string, ip: string): Promise<IpStageResult> {
    const policy = this.policies.get(subject).ip;
    const key = rateLimitKeys.ip(subject, ip);
    const ttl = toTtlSeconds(policy.keyTtlSeconds);
    const now = toEpochSeconds(this.clock());

    const data = await this.store.hgetall(key);

    if (Object.keys(data).length === 0) {
      await this.store.hset(key, { tokens: policy.capacity - 1, last_update: now });
      await this.store.expire(key, ttl);
      return { allowed: true };
    }

    const stored = Math.min(policy.capacity, Math.max(0, parseStored(data.tokens, 0)));
    const lastUpdate = parseStored(data.last_update, now);
    // Hosts disagreeing on the time must not drain the bucket
    const elapsed = Math.max(0, now - lastUpdate);

    const tokens = Math.min(policy.capacity, stored + (elapsed * policy.refillPerHour) / SECONDS_PER_HOUR);

    if (tokens < 1) {
      const retryAfter = Math.ceil(((1 - tokens) * SECONDS_PER_HOUR) / policy.refillPerHour);
      return {
        allowed: false,
        message: `Too many requests from this IP. Retry after ${retryAfter} seconds`,
        retryAfter,
      };
    }

    await this.store.hset(key, { tokens: tokens - 1, last_update: now });
    await this.store.expire(key, ttl);
    return { allowed: true };
  }
}
