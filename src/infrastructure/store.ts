/**
 * Key-Value Store Capability
 *
 * The narrow set of store operations the rate limiters, the distributed lock
 * and the account lockout need. Each operation is atomic on its own; nothing
 * is atomic across operations issued by the caller.
 *
 * Implementations:
 * - RedisStore: ioredis-backed, shared by every instance of the fleet
 * - MemoryStore: single-process stand-in (dev without Redis, tests)
 *
 * Implementations throw StoreUnavailableError when the store cannot be
 * reached, so callers can tell infrastructure failures from denials.
 */

/**
 * Millisecond epoch clock. Injected so limiters and the memory store can
 * run on simulated time.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * Sorted-set score bound: a number (inclusive), '(' + number (exclusive)
 * or an infinity.
 */
export type ScoreBound = number | `(${number}` | '-inf' | '+inf';

export interface KeyValueStore {
  get(key: string): Promise<string | null>;

  /** SET key value EX ttl */
  set(key: string, value: string, ttlSeconds: number): Promise<void>;

  /** SET key value EX ttl NX; true when the key was created */
  setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean>;

  /** DEL; number of keys removed */
  del(key: string): Promise<number>;

  /** Delete the key only while it still holds `expected` */
  deleteIfEquals(key: string, expected: string): Promise<boolean>;

  exists(key: string): Promise<boolean>;

  /** INCR; value after the increment */
  incr(key: string): Promise<number>;

  /** EXPIRE; false when the key does not exist */
  expire(key: string, ttlSeconds: number): Promise<boolean>;

  zadd(key: string, score: number, member: string): Promise<number>;
  zremrangebyscore(key: string, min: ScoreBound, max: ScoreBound): Promise<number>;
  zcard(key: string): Promise<number>;

  hset(key: string, fields: Record<string, string | number>): Promise<number>;

  /** HGETALL; empty object when the key does not exist */
  hgetall(key: string): Promise<Record<string, string>>;

  ping(): Promise<boolean>;

  getType(): string;
}

/**
 * Store TTLs are whole seconds
 */
export function toTtlSeconds(seconds: number): number {
  return Math.max(1, Math.ceil(seconds));
}
