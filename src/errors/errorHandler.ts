/**
 * Error Handler Middleware
 *
 * Express middleware for catching and formatting API errors.
 * Converts all errors to the standardized ApiErrorResponse format.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ApiError, InternalError, NotFoundError, StoreUnavailableError, ValidationError } from './ApiError';
import { createLogger, extractError } from '../utils/logger';
import { requestContext } from '../utils/requestContext';

const log = createLogger('ERRORS');

/**
 * body-parser marks malformed JSON with `type: 'entity.parse.failed'`
 */
function isBodyParseError(error: Error): boolean {
  return 'type' in error && error.type === 'entity.parse.failed';
}

/**
 * Main error handler middleware
 *
 * Should be registered last in the middleware chain.
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
): void {
  const requestId = requestContext.getRequestId();

  if (isBodyParseError(error)) {
    const apiError = new ValidationError('Request body is not valid JSON');
    res.status(apiError.statusCode).json(apiError.toResponse(requestId));
    return;
  }

  if (error instanceof StoreUnavailableError) {
    log.error('Coordination store unavailable', {
      operation: error.operation,
      path: req.path,
      ...extractError(error.cause),
    });
    res.status(error.statusCode).json(new InternalError().toResponse(requestId));
    return;
  }

  if (error instanceof ApiError) {
    if (error.isOperational) {
      log.warn(`API Error: ${error.code}`, {
        message: error.message,
        statusCode: error.statusCode,
        details: error.details,
      });
    } else {
      log.error(`Unexpected API Error: ${error.code}`, {
        message: error.message,
        stack: error.stack,
        details: error.details,
      });
    }

    res.status(error.statusCode).json(error.toResponse(requestId));
    return;
  }

  log.error('Unhandled error', {
    name: error.name,
    message: error.message,
    stack: error.stack,
  });

  res.status(500).json(new InternalError().toResponse(requestId));
}

/**
 * Async handler wrapper
 *
 * Forwards rejected promises from async route handlers to `next`.
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Not found handler for undefined routes
 */
export function notFoundHandler(req: Request, res: Response): void {
  const error = new NotFoundError(`Route not found: ${req.method} ${req.path}`);
  res.status(404).json(error.toResponse(requestContext.getRequestId()));
}
