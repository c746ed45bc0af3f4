import { describe, it, expect, beforeEach } from 'vitest';
import { describeWindow, EmailWindowLimiter } from '../../../../src/services/rateLimiting/emailWindowLimiter';
import { createPolicyRegistry } from '../../../../src/services/rateLimiting/policies';
import { MemoryStore } from '../../../../src/infrastructure/memoryStore';
import { createManualClock, createTestConfig, type ManualClock } from '../../../helpers/testUtils';

describe('EmailWindowLimiter', () => {
  const policies = createPolicyRegistry(createTestConfig().rateLimit.policies);
  let clock: ManualClock;
  let store: MemoryStore;
  let limiter: EmailWindowLimiter;

  beforeEach(() => {
    clock = createManualClock();
    store = new MemoryStore(clock.now);
    limiter = new EmailWindowLimiter(store, policies, clock.now);
  });

  it('allows up to the window count and denies the next request', async () => {
    for (let i = 0; i < 5; i++) {
      await expect(limiter.check('otp', 'alice@example.com')).resolves.toEqual({ allowed: true });
      clock.advanceSeconds(1);
    }

    await expect(limiter.check('otp', 'alice@example.com')).resolves.toEqual({
      allowed: false,
      message: 'Maximum 5 requests per hour for this identifier',
    });
  });

  it('does not record denied requests', async () => {
    for (let i = 0; i < 6; i++) {
      await limiter.check('otp', 'alice@example.com');
    }

    await expect(store.zcard('rate-limit:otp:email:alice@example.com')).resolves.toBe(5);
  });

  it('admits again once the oldest request leaves the window', async () => {
    for (let i = 0; i < 5; i++) {
      await limiter.check('otp', 'alice@example.com');
    }

    clock.advanceSeconds(3600);
    await expect(limiter.check('otp', 'alice@example.com')).resolves.toMatchObject({ allowed: false });

    clock.advanceSeconds(1);
    await expect(limiter.check('otp', 'alice@example.com')).resolves.toEqual({ allowed: true });
  });

  it('keeps identifiers and subjects apart', async () => {
    for (let i = 0; i < 5; i++) {
      await limiter.check('otp', 'alice@example.com');
    }

    await expect(limiter.check('otp', 'bob@example.com')).resolves.toEqual({ allowed: true });
    await expect(limiter.check('withdrawal', 'alice@example.com')).resolves.toEqual({ allowed: true });
  });

  it('keeps distinct members for requests in the same instant', async () => {
    await limiter.check('otp', 'alice@example.com');
    await limiter.check('otp', 'alice@example.com');

    await expect(store.zcard('rate-limit:otp:email:alice@example.com')).resolves.toBe(2);
  });

  it('expires the key after its TTL', async () => {
    await limiter.check('otp', 'alice@example.com');

    expect(store.ttl('rate-limit:otp:email:alice@example.com')).toBe(7200);
  });
});

describe('describeWindow', () => {
  it('names common windows', () => {
    expect(describeWindow(60)).toBe('minute');
    expect(describeWindow(3600)).toBe('hour');
    expect(describeWindow(86400)).toBe('day');
    expect(describeWindow(900)).toBe('900 seconds');
  });
});
