import { describe, expect, it } from 'vitest';
import { assertValidConfig, validateConfigSchema } from '../../../src/config/schema';
import { DEFAULT_RATE_LIMIT_POLICIES } from '../../../src/config/defaults';

function buildValidConfig() {
  return {
    server: {
      nodeEnv: 'test',
      port: 3001,
      trustProxy: true,
      corsOrigins: ['https://app.example.com'],
    },
    redis: {
      url: 'redis://localhost:6379',
      enabled: true,
    },
    rateLimit: {
      policies: DEFAULT_RATE_LIMIT_POLICIES,
    },
    locks: { ttlSeconds: 30 },
    accountLockout: { maxFailedAttempts: 3, lockoutMinutes: 15 },
    logging: { level: 'info' },
  };
}

describe('config schema', () => {
  it('accepts a complete configuration', () => {
    const result = validateConfigSchema(buildValidConfig());

    expect(result.success).toBe(true);
  });

  it('reports every invalid field with its path', () => {
    const config = buildValidConfig();
    const invalid = {
      ...config,
      server: { ...config.server, port: 0, corsOrigins: ['not a url'] },
      locks: { ttlSeconds: 0 },
    };

    const result = validateConfigSchema(invalid);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors.map((error) => error.split(':')[0])).toEqual([
      'server.port',
      'server.corsOrigins.0',
      'locks.ttlSeconds',
    ]);
  });

  it('rejects delay tables keyed by something other than attempt numbers', () => {
    const config = buildValidConfig();
    const otp = DEFAULT_RATE_LIMIT_POLICIES.otp;
    const invalid = {
      ...config,
      rateLimit: {
        policies: {
          otp: { ...otp, progressiveDelay: { ...otp.progressiveDelay, delays: { '0': 10 } } },
        },
      },
    };

    const result = validateConfigSchema(invalid);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors[0]).toContain('attempt numbers start at 1');
  });

  it('rejects negative delays and a zero bucket capacity', () => {
    const config = buildValidConfig();
    const otp = DEFAULT_RATE_LIMIT_POLICIES.otp;
    const invalid = {
      ...config,
      rateLimit: {
        policies: {
          otp: {
            ...otp,
            ip: { ...otp.ip, capacity: 0 },
            progressiveDelay: { ...otp.progressiveDelay, delays: { '3': -1 } },
          },
        },
      },
    };

    const result = validateConfigSchema(invalid);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors).toHaveLength(2);
  });

  it('assertValidConfig throws a summary error', () => {
    const config = { ...buildValidConfig(), logging: { level: 'verbose' } };

    expect(() => assertValidConfig(config)).toThrow(/^Configuration validation failed: logging\.level/);
  });
});
