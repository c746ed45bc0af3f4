/**
 * In-Memory Key-Value Store
 *
 * Single-process implementation of the KeyValueStore capability with Redis
 * semantics for the operations we use (TTL, INCR, sorted sets, hashes).
 * Used when Redis is not configured and as the in-process store in tests.
 *
 * Expiry is evaluated lazily against the injected clock on every access,
 * so no timers are kept alive.
 */

import { systemClock, type Clock, type KeyValueStore, type ScoreBound } from './store';

type StoredData =
  | { type: 'string'; value: string }
  | { type: 'zset'; members: Map<string, number> }
  | { type: 'hash'; fields: Map<string, string> };

interface Entry {
  data: StoredData;
  /** ms epoch; null = no expiry */
  expiresAt: number | null;
}

const WRONG_TYPE = 'WRONGTYPE Operation against a key holding the wrong kind of value';

function parseBound(bound: ScoreBound): { value: number; exclusive: boolean } {
  if (bound === '-inf') return { value: Number.NEGATIVE_INFINITY, exclusive: false };
  if (bound === '+inf') return { value: Number.POSITIVE_INFINITY, exclusive: false };
  if (typeof bound === 'number') return { value: bound, exclusive: false };
  return { value: Number(bound.slice(1)), exclusive: true };
}

export class MemoryStore implements KeyValueStore {
  private entries = new Map<string, Entry>();
  private readonly clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (entry.expiresAt !== null && entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private expiryFor(ttlSeconds: number): number {
    return this.clock() + ttlSeconds * 1000;
  }

  private stringAt(key: string): string | null {
    const entry = this.live(key);
    if (!entry) return null;
    if (entry.data.type !== 'string') throw new Error(WRONG_TYPE);
    return entry.data.value;
  }

  private zsetAt(key: string, create: boolean): Map<string, number> | null {
    const entry = this.live(key);
    if (entry) {
      if (entry.data.type !== 'zset') throw new Error(WRONG_TYPE);
      return entry.data.members;
    }
    if (!create) return null;

    const members = new Map<string, number>();
    this.entries.set(key, { data: { type: 'zset', members }, expiresAt: null });
    return members;
  }

  private hashAt(key: string, create: boolean): Map<string, string> | null {
    const entry = this.live(key);
    if (entry) {
      if (entry.data.type !== 'hash') throw new Error(WRONG_TYPE);
      return entry.data.fields;
    }
    if (!create) return null;

    const fields = new Map<string, string>();
    this.entries.set(key, { data: { type: 'hash', fields }, expiresAt: null });
    return fields;
  }

  async get(key: string): Promise<string | null> {
    return this.stringAt(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.entries.set(key, { data: { type: 'string', value }, expiresAt: this.expiryFor(ttlSeconds) });
  }

  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    if (this.live(key)) {
      return false;
    }
    await this.set(key, value, ttlSeconds);
    return true;
  }

  async del(key: string): Promise<number> {
    if (!this.live(key)) return 0;
    this.entries.delete(key);
    return 1;
  }

  async deleteIfEquals(key: string, expected: string): Promise<boolean> {
    const entry = this.live(key);
    if (!entry || entry.data.type !== 'string' || entry.data.value !== expected) {
      return false;
    }
    this.entries.delete(key);
    return true;
  }

  async exists(key: string): Promise<boolean> {
    return this.live(key) !== undefined;
  }

  async incr(key: string): Promise<number> {
    const entry = this.live(key);
    if (!entry) {
      this.entries.set(key, { data: { type: 'string', value: '1' }, expiresAt: null });
      return 1;
    }
    if (entry.data.type !== 'string') throw new Error(WRONG_TYPE);
    if (!/^-?\d+$/.test(entry.data.value)) {
      throw new Error('ERR value is not an integer or out of range');
    }

    const next = Number(entry.data.value) + 1;
    entry.data = { type: 'string', value: String(next) };
    return next;
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry) return false;
    entry.expiresAt = this.expiryFor(ttlSeconds);
    return true;
  }

  async zadd(key: string, score: number, member: string): Promise<number> {
    const members = this.zsetAt(key, true);
    if (!members) return 0;
    const added = members.has(member) ? 0 : 1;
    members.set(member, score);
    return added;
  }

  async zremrangebyscore(key: string, min: ScoreBound, max: ScoreBound): Promise<number> {
    const members = this.zsetAt(key, false);
    if (!members) return 0;

    const lo = parseBound(min);
    const hi = parseBound(max);
    let removed = 0;

    for (const [member, score] of members) {
      const aboveMin = lo.exclusive ? score > lo.value : score >= lo.value;
      const belowMax = hi.exclusive ? score < hi.value : score <= hi.value;
      if (aboveMin && belowMax) {
        members.delete(member);
        removed++;
      }
    }

    // Redis drops empty sorted sets
    if (members.size === 0) {
      this.entries.delete(key);
    }
    return removed;
  }

  async zcard(key: string): Promise<number> {
    return this.zsetAt(key, false)?.size ?? 0;
  }

  async hset(key: string, fields: Record<string, string | number>): Promise<number> {
    const hash = this.hashAt(key, true);
    if (!hash) return 0;

    let added = 0;
    for (const [field, value] of Object.entries(fields)) {
      if (!hash.has(field)) added++;
      hash.set(field, String(value));
    }
    return added;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    const hash = this.hashAt(key, false);
    return hash ? Object.fromEntries(hash) : {};
  }

  async ping(): Promise<boolean> {
    return true;
  }

  getType(): string {
    return 'memory';
  }

  /**
   * Remaining TTL in seconds; -1 without expiry, -2 when absent (Redis TTL semantics)
   */
  ttl(key: string): number {
    const entry = this.live(key);
    if (!entry) return -2;
    if (entry.expiresAt === null) return -1;
    return Math.ceil((entry.expiresAt - this.clock()) / 1000);
  }
}
