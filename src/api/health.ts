/**
 * Health Check API
 *
 * Reports whether the coordination store answers. Rate limiting and locking
 * both depend on it, so an unreachable store makes the service unhealthy.
 */

import { Router, Request, Response } from 'express';
import { asyncHandler } from '../errors/errorHandler';
import type { KeyValueStore } from '../infrastructure/store';
import { createLogger, extractError } from '../utils/logger';

const log = createLogger('HEALTH');

export type HealthStatus = 'healthy' | 'unhealthy';

export interface ComponentHealth {
  status: HealthStatus;
  message?: string;
  latency?: number;
  details?: Record<string, unknown>;
}

export interface HealthResponse {
  status: HealthStatus;
  timestamp: string;
  uptime: number;
  components: {
    store: ComponentHealth;
  };
}

/**
 * Check coordination store connectivity
 */
export async function checkStore(store: KeyValueStore): Promise<ComponentHealth> {
  const start = Date.now();
  const details = { type: store.getType() };

  try {
    const ok = await store.ping();
    return {
      status: ok ? 'healthy' : 'unhealthy',
      ...(ok ? {} : { message: 'Unexpected ping reply' }),
      latency: Date.now() - start,
      details,
    };
  } catch (error) {
    log.error('Store health check failed', extractError(error));
    return {
      status: 'unhealthy',
      message: 'Store unreachable',
      latency: Date.now() - start,
      details,
    };
  }
}

export function createHealthRouter(store: KeyValueStore): Router {
  const router = Router();

  /**
   * GET /health
   */
  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const storeHealth = await checkStore(store);

      const body: HealthResponse = {
        status: storeHealth.status,
        timestamp: new Date().toISOString(),
        uptime: Math.floor(process.uptime()),
        components: { store: storeHealth },
      };

      res.status(body.status === 'healthy' ? 200 : 503).json(body);
    })
  );

  return router;
}
