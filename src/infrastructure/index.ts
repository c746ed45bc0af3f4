/**
 * Infrastructure Module
 *
 * Coordination store and distributed locking.
 */

export { initializeStore, shutdownStore } from './redis';

export { systemClock, toTtlSeconds, type Clock, type KeyValueStore, type ScoreBound } from './store';
export { MemoryStore } from './memoryStore';
export { RedisStore } from './redisStore';

export {
  DistributedLock,
  LockRegistry,
  type LockAcquisition,
  type LockRelease,
  type LockedResult,
  type LockOptions,
} from './distributedLock';
