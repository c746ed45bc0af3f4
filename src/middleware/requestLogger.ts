/**
 * Request Logger Middleware
 *
 * Provides request correlation IDs and request lifecycle logging.
 * - Assigns unique request ID to each incoming request
 * - Logs request completion with status and duration
 * - Makes request context available throughout the request lifecycle
 * - Sets X-Request-ID response header for client correlation
 */

import { Request, Response, NextFunction } from 'express';
import { requestContext, type RequestContextData } from '../utils/requestContext';
import { createLogger } from '../utils/logger';
import { redactObject } from '../utils/redact';

const log = createLogger('HTTP');

/**
 * Paths to exclude from logging (health checks, scrapes)
 */
const EXCLUDED_PATHS = ['/health', '/metrics'];

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim() !== '' ? first.trim() : undefined;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Request logger middleware
 *
 * Wraps each request in a context with a unique request ID.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  // Use an upstream request ID (load balancer/proxy) when present
  const requestId =
    headerValue(req.headers['x-request-id']) ??
    headerValue(req.headers['x-correlation-id']) ??
    requestContext.generateRequestId();

  const context: RequestContextData = {
    requestId,
    startTime: Date.now(),
    path: req.path,
    method: req.method,
  };

  res.setHeader('X-Request-ID', requestId);

  const isExcluded = EXCLUDED_PATHS.includes(req.path);

  requestContext.run(context, () => {
    res.on('finish', () => {
      if (isExcluded) return;

      const statusCode = res.statusCode;
      const logData: Record<string, unknown> = {
        status: statusCode,
        duration: `${Date.now() - context.startTime}ms`,
        ip: context.clientIp,
      };

      if (statusCode >= 400 && isPlainObject(req.body)) {
        logData.body = redactObject(req.body);
      }

      if (statusCode >= 500) {
        log.error(`${req.method} ${req.path} completed`, logData);
      } else if (statusCode >= 400) {
        log.warn(`${req.method} ${req.path} completed`, logData);
      } else {
        log.info(`${req.method} ${req.path} completed`, logData);
      }
    });

    next();
  });
}

export default requestLogger;
