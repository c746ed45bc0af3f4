/**
 * Account Lockout Service
 *
 * Tracks failed verification attempts per identifier and locks the account
 * for a fixed duration once `maxFailedAttempts` is reached. State is two
 * TTL-bounded keys per subject and identifier:
 *
 *   auth-lock:{subject}:failed-attempts:{identifier}  -> integer counter
 *   auth-lock:{subject}:account-lock:{identifier}     -> { lockedAt } marker
 *
 * ## Usage
 *
 * ```typescript
 * const otpLockout = accountLockout.forSubject('otp');
 *
 * const { locked, attemptsRemaining } = await otpLockout.incrementFailedAttempts(email);
 * ```
 */

import { DEFAULT_LOCKOUT_MINUTES, DEFAULT_MAX_FAILED_ATTEMPTS } from '../../config/defaults';
import { systemClock, type Clock, type KeyValueStore } from '../../infrastructure/store';
import { createLogger } from '../../utils/logger';
import { maskEmail } from '../../utils/redact';

const log = createLogger('LOCKOUT');

export interface AccountLockoutOptions {
  maxFailedAttempts?: number;
  lockoutMinutes?: number;
  clock?: Clock;
}

export interface FailedAttemptResult {
  attempts: number;
  attemptsRemaining: number;
  locked: boolean;
}

export type LockoutStatus = { locked: false } | { locked: true; message: string };

export class SubjectLockout {
  private readonly lockoutSeconds: number;

  constructor(
    private readonly store: KeyValueStore,
    readonly subject: string,
    private readonly maxFailedAttempts: number,
    private readonly lockoutMinutes: number,
    private readonly clock: Clock
  ) {
    this.lockoutSeconds = lockoutMinutes * 60;
  }

  private failedAttemptsKey(identifier: string): string {
    return `auth-lock:${this.subject}:failed-attempts:${identifier}`;
  }

  private accountLockKey(identifier: string): string {
    return `auth-lock:${this.subject}:account-lock:${identifier}`;
  }

  /**
   * Record a failed attempt; locks the account when the maximum is reached
   */
  async incrementFailedAttempts(identifier: string): Promise<FailedAttemptResult> {
    const key = this.failedAttemptsKey(identifier);
    const attempts = await this.store.incr(key);

    if (attempts === 1) {
      await this.store.expire(key, this.lockoutSeconds);
    }

    if (attempts >= this.maxFailedAttempts) {
      await this.lockAccount(identifier);
      return { attempts, attemptsRemaining: 0, locked: true };
    }

    log.debug('Failed attempt recorded', { subject: this.subject, identifier: maskEmail(identifier), attempts });
    return { attempts, attemptsRemaining: this.maxFailedAttempts - attempts, locked: false };
  }

  async resetFailedAttempts(identifier: string): Promise<void> {
    await this.store.del(this.failedAttemptsKey(identifier));
  }

  async getFailedAttempts(identifier: string): Promise<number> {
    const raw = await this.store.get(this.failedAttemptsKey(identifier));
    if (raw === null) return 0;
    const attempts = Number.parseInt(raw, 10);
    return Number.isNaN(attempts) ? 0 : attempts;
  }

  async isAccountLocked(identifier: string): Promise<LockoutStatus> {
    const locked = await this.store.exists(this.accountLockKey(identifier));
    if (!locked) {
      return { locked: false };
    }
    return { locked: true, message: this.lockedMessage() };
  }

  lockedMessage(): string {
    return `Account is locked. Try again after ${this.lockoutMinutes} minutes.`;
  }

  private async lockAccount(identifier: string): Promise<void> {
    const lockedAt = new Date(this.clock()).toISOString();
    // An existing lock keeps its original expiry
    const created = await this.store.setIfAbsent(
      this.accountLockKey(identifier),
      JSON.stringify({ lockedAt }),
      this.lockoutSeconds
    );

    if (created) {
      log.info('Account locked after too many failed attempts', {
        subject: this.subject,
        identifier: maskEmail(identifier),
        lockoutMinutes: this.lockoutMinutes,
      });
    }
  }
}

export class AccountLockoutService {
  private readonly maxFailedAttempts: number;
  private readonly lockoutMinutes: number;
  private readonly clock: Clock;

  constructor(
    private readonly store: KeyValueStore,
    options: AccountLockoutOptions = {}
  ) {
    this.maxFailedAttempts = options.maxFailedAttempts ?? DEFAULT_MAX_FAILED_ATTEMPTS;
    this.lockoutMinutes = options.lockoutMinutes ?? DEFAULT_LOCKOUT_MINUTES;
    this.clock = options.clock ?? systemClock;
  }

  forSubject(subject: string): SubjectLockout {
    return new SubjectLockout(this.store, subject, this.maxFailedAttempts, this.lockoutMinutes, this.clock);
  }
}
