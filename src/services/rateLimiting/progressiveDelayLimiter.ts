/**
 * Progressive Delay Limiter
 *
 * Escalating minimum spacing between attempts by one identifier. With
 * delays { 1: 0, 2: 0, 3: 30, 4: 120, 5: 900 } the first two attempts are
 * free, the third must come 30s after the last allowed attempt, and so on.
 *
 * Every attempt counts, including denied ones. Only allowed attempts move
 * the last-attempt timestamp.
 */

import { systemClock, toTtlSeconds, type Clock, type KeyValueStore } from '../../infrastructure/store';
import { rateLimitKeys, toEpochSeconds } from './keys';
import type { RateLimitPolicyRegistry } from './policies';
import type { ProgressiveStageResult } from './types';

export class ProgressiveDelayLimiter {
  constructor(
    private readonly store: KeyValueStore,
    private readonly policies: RateLimitPolicyRegistry,
    private readonly clock: Clock = systemClock
  ) {}

  async check(subject: string, identifier: string): Promise<ProgressiveStageResult> {
    const policy = this.policies.get(subject).progressiveDelay;
    const attemptsKey = rateLimitKeys.attempts(subject, identifier);
    const lastTimeKey = rateLimitKeys.lastTime(subject, identifier);

    const attempt = await this.store.incr(attemptsKey);
    if (attempt === 1) {
      await this.store.expire(attemptsKey, toTtlSeconds(policy.attemptsKeyTtlSeconds));
    }

    const requiredDelay = policy.delays.get(attempt) ?? policy.defaultDelaySeconds;
    const now = toEpochSeconds(this.clock());

    if (requiredDelay > 0) {
      const raw = await this.store.get(lastTimeKey);
      const lastTime = raw === null ? Number.NaN : Number(raw);

      if (Number.isFinite(lastTime)) {
        const elapsed = now - lastTime;
        if (elapsed < requiredDelay) {
          const remaining = Math.ceil(requiredDelay - elapsed);
          return { allowed: false, message: `Please wait ${remaining} seconds`, attempt };
        }
      }
    }

    await this.store.set(lastTimeKey, String(now), toTtlSeconds(policy.lastTimeKeyTtlSeconds));
    return { allowed: true, attempt };
  }
}
