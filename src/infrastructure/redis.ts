/**
 * Redis Infrastructure Module
 *
 * Connection management for the shared coordination store.
 *
 * - REDIS_URL set: connects with ioredis and exposes a RedisStore. A failed
 *   connection is fatal; silently switching a fleet to per-process memory
 *   would turn every limiter and lock into a local one.
 * - REDIS_URL unset: single-instance mode on a MemoryStore (development).
 *
 * ## Usage
 *
 * ```typescript
 * const store = await initializeStore();
 * // ...
 * await shutdownStore();
 * ```
 */

import Redis from 'ioredis';
import { getConfig, type AppConfig } from '../config';
import { createLogger } from '../utils/logger';
import { MemoryStore } from './memoryStore';
import { RedisStore } from './redisStore';
import type { KeyValueStore } from './store';

const log = createLogger('REDIS');

const CONNECT_TIMEOUT_MS = 10000;

let redisClient: Redis | null = null;
let activeStore: KeyValueStore | null = null;

function waitForReady(client: Redis): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const timeout = setTimeout(() => {
      reject(new Error('Redis connection timeout'));
    }, CONNECT_TIMEOUT_MS);

    client.once('ready', () => {
      clearTimeout(timeout);
      resolve();
    });

    client.once('error', (err: Error) => {
      clearTimeout(timeout);
      reject(err);
    });
  });
}

/**
 * Initialize the coordination store
 */
export async function initializeStore(config: AppConfig = getConfig()): Promise<KeyValueStore> {
  if (activeStore) {
    log.warn('Coordination store already initialized');
    return activeStore;
  }

  if (!config.redis.enabled) {
    log.warn('REDIS_URL not set, using in-memory store (single instance only)');
    activeStore = new MemoryStore();
    return activeStore;
  }

  log.info('Connecting to Redis', {
    url: config.redis.url.replace(/\/\/.*@/, '//<credentials>@'),
  });

  const client = new Redis(config.redis.url, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      const delay = Math.min(times * 100, 3000);
      log.warn(`Redis connection retry ${times}, waiting ${delay}ms`);
      return delay;
    },
    reconnectOnError(err) {
      return err.message.includes('READONLY');
    },
  });

  try {
    await waitForReady(client);
  } catch (error) {
    log.error('Failed to connect to Redis', { error });
    client.disconnect();
    throw error;
  }

  client.on('error', (err: Error) => {
    log.error('Redis client error', { error: err.message });
  });

  redisClient = client;
  activeStore = new RedisStore(client);
  log.info('Redis coordination store ready');
  return activeStore;
}

/**
 * Close the Redis connection (no-op for the memory store)
 */
export async function shutdownStore(): Promise<void> {
  if (redisClient) {
    log.info('Closing Redis connection');
    await redisClient.quit();
    redisClient = null;
  }
  activeStore = null;
}
