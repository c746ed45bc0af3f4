/**
 * Email Sliding Window Limiter
 *
 * Caps requests per identifying e-mail inside a rolling window. Each
 * admitted request is a sorted-set member scored by its timestamp.
 *
 * Prune, count and add are separate round trips: two requests arriving
 * together can both read a count below the limit and both be admitted.
 */

import crypto from 'crypto';
import { systemClock, toTtlSeconds, type Clock, type KeyValueStore } from '../../infrastructure/store';
import { rateLimitKeys, toEpochSeconds } from './keys';
import type { RateLimitPolicyRegistry } from './policies';
import type { StageResult } from './types';

/**
 * Render a window length for user-facing messages
 */
export function describeWindow(seconds: number): string {
  switch (seconds) {
    case 60:
      return 'minute';
    case 3600:
      return 'hour';
    case 86400:
      return 'day';
    default:
      return `${seconds} seconds`;
  }
}

export class EmailWindowLimiter {
  constructor(
    private readonly store: KeyValueStore,
    private readonly policies: RateLimitPolicyRegistry,
    private readonly clock: Clock = systemClock
  ) {}

  async check(subject: string, email: string): Promise<StageResult> {
    const policy = this.policies.get(subject).email;
    const key = rateLimitKeys.email(subject, email);
    const now = toEpochSeconds(this.clock());
    const windowStart = now - policy.windowSeconds;

    await this.store.zremrangebyscore(key, '-inf', `(${windowStart}`);
    const count = await this.store.zcard(key);

    if (count >= policy.count) {
      return {
        allowed: false,
        message: `Maximum ${policy.count} requests per ${describeWindow(policy.windowSeconds)} for this identifier`,
      };
    }

    // Suffix keeps simultaneous requests distinct members
    const member = `${now}-${crypto.randomBytes(4).toString('hex')}`;
    await this.store.zadd(key, now, member);
    await this.store.expire(key, toTtlSeconds(policy.keyTtlSeconds));
    return { allowed: true };
  }
}
