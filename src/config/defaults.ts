/**
 * Default rate limit policies per subject.
 *
 * Every number can be overridden through RATE_LIMIT_<SUBJECT>_* environment
 * variables (see config/index.ts).
 */

import type { RateLimitPolicyConfig } from './schema';

export const DEFAULT_RATE_LIMIT_POLICIES: Record<string, RateLimitPolicyConfig> = {
  // OTP issuance: 5 per hour per e-mail, 20-token bucket per IP, 1000/min overall
  otp: {
    email: { count: 5, windowSeconds: 3600, keyTtlSeconds: 7200 },
    ip: { capacity: 20, refillPerHour: 10, keyTtlSeconds: 7200 },
    progressiveDelay: {
      delays: { '1': 0, '2': 0, '3': 30, '4': 120, '5': 900 },
      defaultDelaySeconds: 900,
      attemptsKeyTtlSeconds: 3600,
      lastTimeKeyTtlSeconds: 3600,
    },
    global: { count: 1000, windowSeconds: 60 },
  },

  withdrawal: {
    email: { count: 10, windowSeconds: 3600, keyTtlSeconds: 7200 },
    ip: { capacity: 30, refillPerHour: 20, keyTtlSeconds: 7200 },
    progressiveDelay: {
      delays: { '1': 0, '2': 0, '3': 0, '4': 10, '5': 60 },
      defaultDelaySeconds: 300,
      attemptsKeyTtlSeconds: 3600,
      lastTimeKeyTtlSeconds: 3600,
    },
    global: { count: 500, windowSeconds: 60 },
  },
};

export const DEFAULT_LOCK_TTL_SECONDS = 30;
export const DEFAULT_MAX_FAILED_ATTEMPTS = 3;
export const DEFAULT_LOCKOUT_MINUTES = 15;
