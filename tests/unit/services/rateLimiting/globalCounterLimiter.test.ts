import { describe, it, expect, beforeEach } from 'vitest';
import { GlobalCounterLimiter } from '../../../../src/services/rateLimiting/globalCounterLimiter';
import { createPolicyRegistry } from '../../../../src/services/rateLimiting/policies';
import { MemoryStore } from '../../../../src/infrastructure/memoryStore';
import { createManualClock, createTestConfig, type ManualClock } from '../../../helpers/testUtils';

describe('GlobalCounterLimiter', () => {
  const policies = createPolicyRegistry(createTestConfig().rateLimit.policies);
  let clock: ManualClock;
  let store: MemoryStore;
  let limiter: GlobalCounterLimiter;

  beforeEach(() => {
    clock = createManualClock();
    store = new MemoryStore(clock.now);
    limiter = new GlobalCounterLimiter(store, policies);
  });

  it('allows up to the count and denies beyond it', async () => {
    for (let i = 0; i < 1000; i++) {
      await limiter.check('otp');
    }

    await expect(limiter.check('otp')).resolves.toEqual({
      allowed: false,
      message: 'System is experiencing high load',
    });
  });

  it('starts a new window after it expires', async () => {
    for (let i = 0; i < 1001; i++) {
      await limiter.check('otp');
    }

    clock.advanceSeconds(60);

    await expect(limiter.check('otp')).resolves.toEqual({ allowed: true });
    await expect(store.get('rate-limit:otp:global')).resolves.toBe('1');
  });

  it('sets the window TTL on the first request only', async () => {
    await limiter.check('otp');
    clock.advanceSeconds(20);
    await limiter.check('otp');

    expect(store.ttl('rate-limit:otp:global')).toBe(40);
  });

  it('counts subjects separately', async () => {
    await limiter.check('otp');

    await expect(store.get('rate-limit:withdrawal:global')).resolves.toBeNull();
  });
});
