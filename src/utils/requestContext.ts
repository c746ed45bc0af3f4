/**
 * Request Context
 *
 * Request-scoped context using AsyncLocalStorage, so the request ID is
 * available to the logger and the error handler without passing it around.
 *
 * Usage:
 *   requestContext.run({ requestId: 'abc123', startTime: Date.now() }, next);
 *   requestContext.getRequestId(); // 'abc123'
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface RequestContextData {
  /** Unique request correlation ID for tracing */
  requestId: string;
  /** Request start time for duration calculation */
  startTime: number;
  path?: string;
  method?: string;
  /** Client IP as seen by the rate limiter */
  clientIp?: string;
}

const asyncLocalStorage = new AsyncLocalStorage<RequestContextData>();

export const requestContext = {
  run<T>(context: RequestContextData, fn: () => T): T {
    return asyncLocalStorage.run(context, fn);
  },

  /**
   * Get the current request context (undefined outside request scope)
   */
  get(): RequestContextData | undefined {
    return asyncLocalStorage.getStore();
  },

  /**
   * Get the current request ID ('no-request' outside request scope)
   */
  getRequestId(): string {
    return asyncLocalStorage.getStore()?.requestId ?? 'no-request';
  },

  getDuration(): number {
    const store = asyncLocalStorage.getStore();
    if (!store) return 0;
    return Date.now() - store.startTime;
  },

  /**
   * Generate a new request ID (first UUID group, 8 characters)
   */
  generateRequestId(): string {
    return randomUUID().split('-')[0] ?? randomUUID();
  },
};

export default requestContext;
