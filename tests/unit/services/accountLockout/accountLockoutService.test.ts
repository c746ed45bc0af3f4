/**
 * Account Lockout Service Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { AccountLockoutService, type SubjectLockout } from '../../../../src/services/accountLockout';
import { MemoryStore } from '../../../../src/infrastructure/memoryStore';
import { createManualClock, TEST_EPOCH_MS, type ManualClock } from '../../../helpers/testUtils';

const LOCK_KEY = 'auth-lock:otp:account-lock:alice@example.com';
const ATTEMPTS_KEY = 'auth-lock:otp:failed-attempts:alice@example.com';

describe('AccountLockoutService', () => {
  let clock: ManualClock;
  let store: MemoryStore;
  let lockout: SubjectLockout;

  beforeEach(() => {
    clock = createManualClock();
    store = new MemoryStore(clock.now);
    lockout = new AccountLockoutService(store, { clock: clock.now }).forSubject('otp');
  });

  it('counts failed attempts down to the lock', async () => {
    await expect(lockout.incrementFailedAttempts('alice@example.com')).resolves.toEqual({
      attempts: 1,
      attemptsRemaining: 2,
      locked: false,
    });
    await expect(lockout.incrementFailedAttempts('alice@example.com')).resolves.toEqual({
      attempts: 2,
      attemptsRemaining: 1,
      locked: false,
    });
    await expect(lockout.incrementFailedAttempts('alice@example.com')).resolves.toEqual({
      attempts: 3,
      attemptsRemaining: 0,
      locked: true,
    });
  });

  it('reports the lock with the lockout duration', async () => {
    for (let i = 0; i < 3; i++) {
      await lockout.incrementFailedAttempts('alice@example.com');
    }

    await expect(lockout.isAccountLocked('alice@example.com')).resolves.toEqual({
      locked: true,
      message: 'Account is locked. Try again after 15 minutes.',
    });
    await expect(store.get(LOCK_KEY)).resolves.toBe(JSON.stringify({ lockedAt: new Date(TEST_EPOCH_MS).toISOString() }));
    expect(store.ttl(LOCK_KEY)).toBe(900);
  });

  it('unlocks once the lockout expires', async () => {
    for (let i = 0; i < 3; i++) {
      await lockout.incrementFailedAttempts('alice@example.com');
    }

    clock.advanceSeconds(15 * 60);

    await expect(lockout.isAccountLocked('alice@example.com')).resolves.toEqual({ locked: false });
    await expect(lockout.getFailedAttempts('alice@example.com')).resolves.toBe(0);
  });

  it('keeps the original expiry when further attempts fail while locked', async () => {
    for (let i = 0; i < 3; i++) {
      await lockout.incrementFailedAttempts('alice@example.com');
    }

    clock.advanceSeconds(300);
    await lockout.incrementFailedAttempts('alice@example.com');

    expect(store.ttl(LOCK_KEY)).toBe(600);
  });

  it('resets the counter after a success', async () => {
    await lockout.incrementFailedAttempts('alice@example.com');
    await lockout.incrementFailedAttempts('alice@example.com');

    await lockout.resetFailedAttempts('alice@example.com');

    await expect(lockout.getFailedAttempts('alice@example.com')).resolves.toBe(0);
    await expect(lockout.incrementFailedAttempts('alice@example.com')).resolves.toMatchObject({ attempts: 1 });
  });

  it('expires the counter with the lockout window', async () => {
    await lockout.incrementFailedAttempts('alice@example.com');

    expect(store.ttl(ATTEMPTS_KEY)).toBe(900);
  });

  it('keeps subjects and identifiers apart', async () => {
    const service = new AccountLockoutService(store, { maxFailedAttempts: 1, lockoutMinutes: 5, clock: clock.now });
    const withdrawals = service.forSubject('withdrawal');

    await withdrawals.incrementFailedAttempts('alice@example.com');

    await expect(withdrawals.isAccountLocked('alice@example.com')).resolves.toEqual({
      locked: true,
      message: 'Account is locked. Try again after 5 minutes.',
    });
    await expect(withdrawals.isAccountLocked('bob@example.com')).resolves.toEqual({ locked: false });
    await expect(lockout.isAccountLocked('alice@example.com')).resolves.toEqual({ locked: false });
  });
});
