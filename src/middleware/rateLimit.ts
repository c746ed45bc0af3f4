/**
 * Rate Limit Middleware
 *
 * Express interceptor binding an endpoint to a rate limit subject and to the
 * request field that identifies the caller. The binding is declared where the
 * route is registered.
 *
 * ## Usage
 *
 * ```typescript
 * router.post(
 *   '/otp/request',
 *   rateLimitInterceptor({ coordinator, subject: 'otp', identifier: fromBody('email') }),
 *   handler
 * );
 * ```
 *
 * Denials answer 429 `{ message, attempt? }` with `Retry-After` when the IP
 * bucket supplied one. Store failures go to the error handler (500).
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { MissingRequiredFieldError } from '../errors/ApiError';
import type { IRateLimitCoordinator, RateLimitDecision } from '../services/rateLimiting';
import { requestContext } from '../utils/requestContext';

/**
 * Where the rate-limited identifier comes from
 */
export interface IdentifierSource {
  /** Field name reported when the identifier is missing */
  name: string;
  from: (req: Request) => string | undefined;
}

export interface RateLimitInterceptorOptions {
  coordinator: IRateLimitCoordinator;
  subject: string;
  identifier: IdentifierSource;
}

/**
 * Identifier read from a JSON body field (trimmed, lower-cased)
 */
export function fromBody(field: string): IdentifierSource {
  return {
    name: field,
    from: (req: Request) => {
      const value: unknown = req.body?.[field];
      if (typeof value !== 'string') return undefined;
      const trimmed = value.trim().toLowerCase();
      return trimmed === '' ? undefined : trimmed;
    },
  };
}

/**
 * Get client IP address
 *
 * `req.ip` honours the app's `trust proxy` setting, so only the hop added by
 * a trusted proxy is read. Raw X-Forwarded-For is never consulted.
 */
export function getClientIp(req: Request): string {
  return req.ip || req.socket.remoteAddress || 'unknown';
}

/**
 * Send rate limit exceeded response
 */
function sendRateLimitResponse(res: Response, decision: RateLimitDecision): void {
  if (decision.retryAfter !== undefined) {
    res.setHeader('Retry-After', String(decision.retryAfter));
  }

  res.status(429).json({
    message: decision.message ?? 'Too many requests',
    ...(decision.attempt !== undefined ? { attempt: decision.attempt } : {}),
  });
}

export function rateLimitInterceptor(options: RateLimitInterceptorOptions): RequestHandler {
  const { coordinator, subject, identifier } = options;

  return async (req: Request, res: Response, next: NextFunction) => {
    const value = identifier.from(req);
    if (value === undefined) {
      next(new MissingRequiredFieldError(identifier.name));
      return;
    }

    const ip = getClientIp(req);
    const ctx = requestContext.get();
    if (ctx) {
      ctx.clientIp = ip;
    }

    try {
      const decision = await coordinator.checkLimit(subject, value, ip);
      if (!decision.allowed) {
        sendRateLimitResponse(res, decision);
        return;
      }
      next();
    } catch (error) {
      next(error);
    }
  };
}
