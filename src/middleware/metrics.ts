/**
 * Metrics Middleware
 *
 * Express middleware for HTTP request metrics collection.
 *
 * ## Usage
 *
 * ```typescript
 * import { metricsMiddleware, metricsHandler } from '../middleware/metrics';
 *
 * // Add middleware early in the chain
 * app.use(metricsMiddleware());
 *
 * // Expose /metrics endpoint for Prometheus scraping
 * app.get('/metrics', metricsHandler);
 * ```
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { metricsService, httpRequestDuration, httpRequestsTotal, normalizePath } from '../observability/metrics';
import { createLogger, extractError } from '../utils/logger';

const log = createLogger('METRICS');

interface MetricsMiddlewareOptions {
  /** Paths to exclude from metrics */
  excludePaths?: string[];
  pathNormalizer?: (path: string) => string;
}

const DEFAULT_EXCLUDE_PATHS = ['/health', '/metrics'];

/**
 * Records request duration and count per method, path and status
 */
export function metricsMiddleware(options: MetricsMiddlewareOptions = {}): RequestHandler {
  const { excludePaths = DEFAULT_EXCLUDE_PATHS, pathNormalizer = normalizePath } = options;

  return (req: Request, res: Response, next: NextFunction) => {
    if (excludePaths.some((p) => req.path.startsWith(p))) {
      return next();
    }

    const startTime = process.hrtime.bigint();
    const method = req.method;
    const path = pathNormalizer(req.path);

    res.on('finish', () => {
      const duration = Number(process.hrtime.bigint() - startTime) / 1e9;
      const status = String(res.statusCode);

      httpRequestDuration.observe({ method, path, status }, duration);
      httpRequestsTotal.inc({ method, path, status });
    });

    next();
  };
}

/**
 * Exposes Prometheus metrics at /metrics
 */
export async function metricsHandler(req: Request, res: Response): Promise<void> {
  try {
    const metrics = await metricsService.getMetrics();
    res.set('Content-Type', metricsService.getContentType());
    res.send(metrics);
  } catch (error) {
    log.error('Failed to get metrics', extractError(error));
    res.status(500).send('Failed to collect metrics');
  }
}
