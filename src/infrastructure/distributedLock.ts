/**
 * Distributed Lock Infrastructure
 *
 * Store-backed mutual exclusion for coordinating balance-affecting work
 * (withdrawals, deposit webhooks) across every instance of the fleet.
 *
 * ## Semantics
 *
 * - acquire: SET lock:{category}:{resourceId} <random token> EX ttl NX.
 *   A held lock is reported immediately; there is no blocking or retry.
 * - release: only the holder of the stored token may delete the key. A
 *   caller whose lock already expired (and was taken by someone else) gets
 *   an ownership mismatch and the newer lock stays in place.
 * - TTL bounds every lock, so a crashed holder never blocks forever.
 * - Store failures propagate: an unavailable store means "cannot acquire".
 *
 * ## Usage
 *
 * ```typescript
 * const lock = lockRegistry.get('withdrawals');
 *
 * const outcome = await lock.withLock(walletId, async () => {
 *   return processor.initiate(request);
 * });
 * if (!outcome.success) {
 *   throw new ResourceLockedError('withdrawals', walletId);
 * }
 * ```
 */

import crypto from 'crypto';
import { DEFAULT_LOCK_TTL_SECONDS } from '../config/defaults';
import { lockOperationsTotal } from '../observability/metrics';
import { createLogger, extractError } from '../utils/logger';
import { systemClock, type Clock, type KeyValueStore } from './store';

const log = createLogger('LOCK');

// =============================================================================
// Types
// =============================================================================

export type LockAcquisition =
  | { acquired: true; key: string; token: string; expiresAt: number }
  | { acquired: false; key: string; reason: 'held'; message: string };

export type LockRelease =
  | { released: true; key: string }
  | { released: false; key: string; reason: 'ownership-mismatch'; message: string };

export type LockedResult<T> = { success: true; result: T } | { success: false; reason: 'locked' };

export interface LockOptions {
  /** Seconds until the lock expires on its own */
  ttlSeconds?: number;
  clock?: Clock;
}

/**
 * Generate a unique token for lock ownership
 */
function generateToken(): string {
  return crypto.randomBytes(16).toString('hex');
}

// =============================================================================
// Lock
// =============================================================================

export class DistributedLock {
  readonly category: string;
  readonly ttlSeconds: number;
  private readonly store: KeyValueStore;
  private readonly clock: Clock;

  constructor(store: KeyValueStore, category: string, options: LockOptions = {}) {
    this.store = store;
    this.category = category;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_LOCK_TTL_SECONDS;
    this.clock = options.clock ?? systemClock;
  }

  keyFor(resourceId: string): string {
    return `lock:${this.category}:${resourceId}`;
  }

  /**
   * Try once to take the lock for a resource
   */
  async acquire(resourceId: string): Promise<LockAcquisition> {
    const key = this.keyFor(resourceId);
    const token = generateToken();

    const created = await this.store.setIfAbsent(key, token, this.ttlSeconds);

    if (!created) {
      lockOperationsTotal.inc({ category: this.category, operation: 'acquire', outcome: 'held' });
      log.info('Lock already held', { key });
      return { acquired: false, key, reason: 'held', message: 'Lock already held' };
    }

    lockOperationsTotal.inc({ category: this.category, operation: 'acquire', outcome: 'acquired' });
    log.debug('Lock acquired', { key });
    return { acquired: true, key, token, expiresAt: this.clock() + this.ttlSeconds * 1000 };
  }

  /**
   * Release the lock if `token` still owns it
   */
  async release(resourceId: string, token: string): Promise<LockRelease> {
    const key = this.keyFor(resourceId);
    const current = await this.store.get(key);

    // The compare-and-delete covers a lock that expires and is re-acquired
    // between the read above and the delete.
    if (current !== token || !(await this.store.deleteIfEquals(key, token))) {
      lockOperationsTotal.inc({ category: this.category, operation: 'release', outcome: 'mismatch' });
      log.warn('Cannot release lock: ownership mismatch', { key, present: current !== null });
      return { released: false, key, reason: 'ownership-mismatch', message: 'Lock ownership mismatch' };
    }

    lockOperationsTotal.inc({ category: this.category, operation: 'release', outcome: 'released' });
    log.debug('Lock released', { key });
    return { released: true, key };
  }

  /**
   * Run `fn` while holding the lock; the lock is released on every exit path
   *
   * @returns the function result, or `{ success: false }` if the lock is held
   */
  async withLock<T>(resourceId: string, fn: () => Promise<T>): Promise<LockedResult<T>> {
    const acquisition = await this.acquire(resourceId);
    if (!acquisition.acquired) {
      return { success: false, reason: 'locked' };
    }

    try {
      const result = await fn();
      return { success: true, result };
    } finally {
      await this.releaseQuietly(resourceId, acquisition.token);
    }
  }

  /**
   * Point-in-time check; the answer may change immediately after
   */
  isLocked(resourceId: string): Promise<boolean> {
    return this.store.exists(this.keyFor(resourceId));
  }

  private async releaseQuietly(resourceId: string, token: string): Promise<void> {
    try {
      const outcome = await this.release(resourceId, token);
      if (!outcome.released) {
        log.warn('Lock expired before the critical section finished', {
          key: outcome.key,
          ttlSeconds: this.ttlSeconds,
        });
      }
    } catch (error) {
      // The TTL frees the key
      log.error('Lock release failed', { key: this.keyFor(resourceId), ...extractError(error) });
    }
  }
}

// =============================================================================
// Registry
// =============================================================================

/**
 * One DistributedLock per logical category (e.g. 'withdrawals', 'deposits').
 * Purely a local cache; holds no cross-process state.
 */
export class LockRegistry {
  private readonly locks = new Map<string, DistributedLock>();
  private readonly store: KeyValueStore;
  private readonly options: LockOptions;

  constructor(store: KeyValueStore, options: LockOptions = {}) {
    this.store = store;
    this.options = options;
  }

  get(category: string): DistributedLock {
    let lock = this.locks.get(category);
    if (!lock) {
      log.debug('Creating lock instance', { category });
      lock = new DistributedLock(this.store, category, this.options);
      this.locks.set(category, lock);
    }
    return lock;
  }
}
