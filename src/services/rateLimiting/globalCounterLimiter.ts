/**
 * Global Counter Limiter
 *
 * Fixed-window cap on all requests for a subject. The window starts with
 * the first increment, so up to 2x `count` can pass across a boundary.
 */

import { toTtlSeconds, type KeyValueStore } from '../../infrastructure/store';
import { rateLimitKeys } from './keys';
import type { RateLimitPolicyRegistry } from './policies';
import type { StageResult } from './types';

export class GlobalCounterLimiter {
  constructor(
    private readonly store: KeyValueStore,
    private readonly policies: RateLimitPolicyRegistry
  ) {}

  async check(subject: string): Promise<StageResult> {
    const policy = this.policies.get(subject).global;
    const key = rateLimitKeys.global(subject);

    const count = await this.store.incr(key);
    if (count === 1) {
      await this.store.expire(key, toTtlSeconds(policy.windowSeconds));
    }

    if (count > policy.count) {
      return { allowed: false, message: 'System is experiencing high load' };
    }
    return { allowed: true };
  }
}
