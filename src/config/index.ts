/**
 * Server Configuration
 *
 * Builds the typed configuration from environment variables, validates it
 * with the zod schemas and caches it. Policies are static for the lifetime
 * of the process; there is no runtime mutation.
 *
 * Rate limit policy overrides, per subject (SUBJECT upper-cased):
 *
 *   RATE_LIMIT_OTP_EMAIL_COUNT=5
 *   RATE_LIMIT_OTP_EMAIL_WINDOW_SECONDS=3600
 *   RATE_LIMIT_OTP_IP_CAPACITY=20
 *   RATE_LIMIT_OTP_IP_REFILL_PER_HOUR=10
 *   RATE_LIMIT_OTP_DELAYS=1:0,2:0,3:30,4:120,5:900
 *   RATE_LIMIT_OTP_GLOBAL_COUNT=1000
 */

import dotenv from 'dotenv';
import { assertValidConfig, type AppConfig, type RateLimitPolicyConfig } from './schema';
import {
  DEFAULT_LOCK_TTL_SECONDS,
  DEFAULT_LOCKOUT_MINUTES,
  DEFAULT_MAX_FAILED_ATTEMPTS,
  DEFAULT_RATE_LIMIT_POLICIES,
} from './defaults';

dotenv.config();

type Env = Record<string, string | undefined>;

function intEnv(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  return Number(raw);
}

function boolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  return raw === 'true' || raw === '1';
}

/**
 * Parse "1:0,2:0,3:30" into { '1': 0, '2': 0, '3': 30 }
 */
export function parseDelays(raw: string): Record<string, number> {
  const delays: Record<string, number> = {};
  for (const pair of raw.split(',')) {
    const trimmed = pair.trim();
    if (!trimmed) continue;
    const [attempt, seconds] = trimmed.split(':');
    delays[(attempt ?? '').trim()] = seconds === undefined ? Number.NaN : Number(seconds.trim());
  }
  return delays;
}

function envPrefix(subject: string): string {
  return `RATE_LIMIT_${subject.toUpperCase().replace(/[^A-Z0-9]/g, '_')}_`;
}

function policyFromEnv(subject: string, defaults: RateLimitPolicyConfig, env: Env): RateLimitPolicyConfig {
  const p = envPrefix(subject);
  const delays = env[`${p}DELAYS`];

  return {
    email: {
      count: intEnv(env, `${p}EMAIL_COUNT`, defaults.email.count),
      windowSeconds: intEnv(env, `${p}EMAIL_WINDOW_SECONDS`, defaults.email.windowSeconds),
      keyTtlSeconds: intEnv(env, `${p}EMAIL_KEY_TTL_SECONDS`, defaults.email.keyTtlSeconds),
    },
    ip: {
      capacity: intEnv(env, `${p}IP_CAPACITY`, defaults.ip.capacity),
      refillPerHour: intEnv(env, `${p}IP_REFILL_PER_HOUR`, defaults.ip.refillPerHour),
      keyTtlSeconds: intEnv(env, `${p}IP_KEY_TTL_SECONDS`, defaults.ip.keyTtlSeconds),
    },
    progressiveDelay: {
      delays: delays ? parseDelays(delays) : { ...defaults.progressiveDelay.delays },
      defaultDelaySeconds: intEnv(env, `${p}DEFAULT_DELAY_SECONDS`, defaults.progressiveDelay.defaultDelaySeconds),
      attemptsKeyTtlSeconds: intEnv(env, `${p}ATTEMPTS_KEY_TTL_SECONDS`, defaults.progressiveDelay.attemptsKeyTtlSeconds),
      lastTimeKeyTtlSeconds: intEnv(env, `${p}LAST_TIME_KEY_TTL_SECONDS`, defaults.progressiveDelay.lastTimeKeyTtlSeconds),
    },
    global: {
      count: intEnv(env, `${p}GLOBAL_COUNT`, defaults.global.count),
      windowSeconds: intEnv(env, `${p}GLOBAL_WINDOW_SECONDS`, defaults.global.windowSeconds),
    },
  };
}

/**
 * Build and validate configuration from an environment map
 */
export function buildConfig(env: Env = process.env): AppConfig {
  const policies: Record<string, RateLimitPolicyConfig> = {};
  for (const [subject, defaults] of Object.entries(DEFAULT_RATE_LIMIT_POLICIES)) {
    policies[subject] = policyFromEnv(subject, defaults, env);
  }

  const redisUrl = env.REDIS_URL ?? '';

  return assertValidConfig({
    server: {
      nodeEnv: env.NODE_ENV || 'development',
      port: intEnv(env, 'PORT', 3001),
      trustProxy: boolEnv(env, 'TRUST_PROXY', true),
      corsOrigins: (env.CORS_ORIGINS ?? '')
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin !== ''),
    },
    redis: {
      url: redisUrl,
      enabled: redisUrl !== '',
    },
    rateLimit: { policies },
    locks: {
      ttlSeconds: intEnv(env, 'LOCK_TTL_SECONDS', DEFAULT_LOCK_TTL_SECONDS),
    },
    accountLockout: {
      maxFailedAttempts: intEnv(env, 'MAX_FAILED_OTP_ATTEMPTS', DEFAULT_MAX_FAILED_ATTEMPTS),
      lockoutMinutes: intEnv(env, 'ACCOUNT_LOCKOUT_MINUTES', DEFAULT_LOCKOUT_MINUTES),
    },
    logging: {
      level: (env.LOG_LEVEL || 'info').toLowerCase(),
    },
  });
}

let cachedConfig: AppConfig | null = null;

/**
 * Get the process configuration (built once, then cached)
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = buildConfig();
  }
  return cachedConfig;
}

/**
 * Drop the cached configuration (tests only)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

export type { AppConfig, RateLimitPolicyConfig } from './schema';
