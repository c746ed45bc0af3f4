/**
 * Rate Limit Policies
 *
 * Immutable subject -> policy registry, built once from the validated
 * configuration and passed by reference to the coordinator and limiters.
 */

import type { RateLimitPolicyConfig } from '../../config';
import type { RateLimitPolicy } from './types';

export class MissingPolicyError extends Error {
  readonly subject: string;

  constructor(subject: string) {
    super(`No rate limit policy registered for subject: ${subject}`);
    this.name = 'MissingPolicyError';
    this.subject = subject;
  }
}

function toPolicy(subject: string, config: RateLimitPolicyConfig): RateLimitPolicy {
  const delays = new Map<number, number>();
  for (const [attempt, seconds] of Object.entries(config.progressiveDelay.delays)) {
    delays.set(Number(attempt), seconds);
  }

  return Object.freeze({
    subject,
    email: Object.freeze({ ...config.email }),
    ip: Object.freeze({ ...config.ip }),
    progressiveDelay: Object.freeze({
      delays,
      defaultDelaySeconds: config.progressiveDelay.defaultDelaySeconds,
      attemptsKeyTtlSeconds: config.progressiveDelay.attemptsKeyTtlSeconds,
      lastTimeKeyTtlSeconds: config.progressiveDelay.lastTimeKeyTtlSeconds,
    }),
    global: Object.freeze({ ...config.global }),
  });
}

export class RateLimitPolicyRegistry {
  private readonly policies: ReadonlyMap<string, RateLimitPolicy>;

  constructor(policies: Iterable<RateLimitPolicy>) {
    const entries = new Map<string, RateLimitPolicy>();
    for (const policy of policies) {
      entries.set(policy.subject, policy);
    }
    this.policies = entries;
    Object.freeze(this);
  }

  has(subject: string): boolean {
    return this.policies.has(subject);
  }

  /**
   * @returns the policy, or undefined for an unknown subject
   */
  find(subject: string): RateLimitPolicy | undefined {
    return this.policies.get(subject);
  }

  /**
   * @throws MissingPolicyError for an unknown subject
   */
  get(subject: string): RateLimitPolicy {
    const policy = this.policies.get(subject);
    if (!policy) {
      throw new MissingPolicyError(subject);
    }
    return policy;
  }

  subjects(): string[] {
    return [...this.policies.keys()];
  }
}

/**
 * Build the registry from `config.rateLimit.policies`
 */
export function createPolicyRegistry(policies: Record<string, RateLimitPolicyConfig>): RateLimitPolicyRegistry {
  return new RateLimitPolicyRegistry(
    Object.entries(policies).map(([subject, config]) => toPolicy(subject, config))
  );
}
