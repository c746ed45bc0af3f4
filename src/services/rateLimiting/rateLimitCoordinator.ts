/**
 * Rate Limit Coordinator
 *
 * Composes the four limiters in a fixed order and stops at the first
 * denial, so the earliest violated policy always names the reason:
 *
 *   Email (sliding window) -> IP (token bucket) -> Progressive delay -> Global
 *
 * ## Failure modes
 *
 * - Unknown subject: allowed (fail-open), logged as a warning and counted in
 *   `offramp_rate_limit_policy_missing_total`. Alert on that counter.
 * - Store failure: the StoreUnavailableError propagates unchanged. It is
 *   never turned into an allow or a deny here.
 *
 * ## Usage
 *
 * ```typescript
 * const coordinator = new RateLimitCoordinator(store, createPolicyRegistry(config.rateLimit.policies));
 *
 * const decision = await coordinator.checkLimit('otp', email, ip);
 * if (!decision.allowed) {
 *   res.status(429).json({ message: decision.message });
 * }
 * ```
 */

import { systemClock, type Clock, type KeyValueStore } from '../../infrastructure/store';
import { rateLimitDecisionsTotal, rateLimitPolicyMissingTotal } from '../../observability/metrics';
import { createLogger } from '../../utils/logger';
import { maskEmail } from '../../utils/redact';
import { EmailWindowLimiter } from './emailWindowLimiter';
import { GlobalCounterLimiter } from './globalCounterLimiter';
import { IpTokenBucketLimiter } from './ipTokenBucketLimiter';
import type { RateLimitPolicyRegistry } from './policies';
import { ProgressiveDelayLimiter } from './progressiveDelayLimiter';
import type { IRateLimitCoordinator, RateLimitDecision, RateLimitStage } from './types';

const log = createLogger('RATELIMIT');

export class RateLimitCoordinator implements IRateLimitCoordinator {
  private readonly emailLimiter: EmailWindowLimiter;
  private readonly ipLimiter: IpTokenBucketLimiter;
  private readonly progressiveLimiter: ProgressiveDelayLimiter;
  private readonly globalLimiter: GlobalCounterLimiter;

  constructor(
    store: KeyValueStore,
    private readonly policies: RateLimitPolicyRegistry,
    clock: Clock = systemClock
  ) {
    this.emailLimiter = new EmailWindowLimiter(store, policies, clock);
    this.ipLimiter = new IpTokenBucketLimiter(store, policies, clock);
    this.progressiveLimiter = new ProgressiveDelayLimiter(store, policies, clock);
    this.globalLimiter = new GlobalCounterLimiter(store, policies);
  }

  async checkLimit(subject: string, email: string, ip: string): Promise<RateLimitDecision> {
    if (!this.policies.has(subject)) {
      log.warn('No rate limit policy for subject, allowing request', { subject });
      rateLimitPolicyMissingTotal.inc({ subject });
      return { allowed: true };
    }

    const emailResult = await this.emailLimiter.check(subject, email);
    if (!emailResult.allowed) {
      return this.deny(subject, 'email', email, { message: emailResult.message });
    }

    const ipResult = await this.ipLimiter.check(subject, ip);
    if (!ipResult.allowed) {
      return this.deny(subject, 'ip', email, { message: ipResult.message, retryAfter: ipResult.retryAfter });
    }

    const progressive = await this.progressiveLimiter.check(subject, email);
    if (!progressive.allowed) {
      return this.deny(subject, 'progressive-delay', email, {
        message: progressive.message,
        attempt: progressive.attempt,
      });
    }

    const globalResult = await this.globalLimiter.check(subject);
    if (!globalResult.allowed) {
      return this.deny(subject, 'global', email, { message: globalResult.message });
    }

    rateLimitDecisionsTotal.inc({ subject, stage: 'none', outcome: 'allowed' });
    log.debug('Rate limit check passed', { subject, attempt: progressive.attempt });
    return { allowed: true, attempt: progressive.attempt };
  }

  private deny(
    subject: string,
    stage: RateLimitStage,
    email: string,
    decision: { message: string; attempt?: number; retryAfter?: number }
  ): RateLimitDecision {
    rateLimitDecisionsTotal.inc({ subject, stage, outcome: 'denied' });
    log.info('Rate limit exceeded', { subject, stage, identifier: maskEmail(email) });
    return { allowed: false, stage, ...decision };
  }
}
