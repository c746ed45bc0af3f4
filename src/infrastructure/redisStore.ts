/**
 * Redis Key-Value Store
 *
 * KeyValueStore over an ioredis connection. Every failure of the underlying
 * client is rethrown as StoreUnavailableError carrying the operation name;
 * no call is retried or converted into a default answer here.
 */

import type Redis from 'ioredis';
import { StoreUnavailableError } from '../errors/ApiError';
import { toTtlSeconds, type KeyValueStore, type ScoreBound } from './store';

/**
 * Lua script to delete a key only while it holds the expected value
 *
 * KEYS[1] = key
 * ARGV[1] = expected value
 *
 * Returns: 1 if deleted, 0 otherwise
 */
const COMPARE_AND_DELETE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

export class RedisStore implements KeyValueStore {
  private readonly redis: Redis;

  constructor(redis: Redis) {
    this.redis = redis;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new StoreUnavailableError(operation, error);
    }
  }

  get(key: string): Promise<string | null> {
    return this.run('get', () => this.redis.get(key));
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.run('set', () => this.redis.set(key, value, 'EX', toTtlSeconds(ttlSeconds)));
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.run('setIfAbsent', () =>
      this.redis.set(key, value, 'EX', toTtlSeconds(ttlSeconds), 'NX')
    );
    return result === 'OK';
  }

  del(key: string): Promise<number> {
    return this.run('del', () => this.redis.del(key));
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    const result = await this.run('deleteIfEquals', () =>
      this.redis.eval(COMPARE_AND_DELETE_SCRIPT, 1, key, expected)
    );
    return result === 1;
  }

  async exists(key: string): Promise<boolean> {
    const count = await this.run('exists', () => this.redis.exists(key));
    return count === 1;
  }

  incr(key: string): Promise<number> {
    return this.run('incr', () => this.redis.incr(key));
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const result = await this.run('expire', () => this.redis.expire(key, toTtlSeconds(ttlSeconds)));
    return result === 1;
  }

  async zadd(key: string, score: number, member: string): Promise<number> {
    const added = await this.run('zadd', () => this.redis.zadd(key, score, member));
    return Number(added);
  }

  zremrangebyscore(key: string, min: ScoreBound, max: ScoreBound): Promise<number> {
    return this.run('zremrangebyscore', () => this.redis.zremrangebyscore(key, min, max));
  }

  zcard(key: string): Promise<number> {
    return this.run('zcard', () => this.redis.zcard(key));
  }

  hset(key: string, fields: Record<string, string | number>): Promise<number> {
    return this.run('hset', () => this.redis.hset(key, fields));
  }

  hgetall(key: string): Promise<Record<string, string>> {
    return this.run('hgetall', () => this.redis.hgetall(key));
  }

  async ping(): Promise<boolean> {
    const result = await this.run('ping', () => this.redis.ping());
    return result === 'PONG';
  }

  getType(): string {
    return 'redis';
  }
}
