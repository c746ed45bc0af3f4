/**
 * API Error Class Hierarchy
 *
 * Standardized error responses across all endpoints. Each error type maps
 * to an HTTP status code and carries a machine-readable code.
 *
 * Rate-limit denials are not errors: the rate-limit interceptor answers
 * them directly. Store failures surface as InternalError (500) and never
 * expose store internals.
 *
 * ## Usage
 *
 * ```typescript
 * throw new ResourceLockedError('withdrawals', walletId);
 *
 * // In error middleware:
 * if (error instanceof ApiError) {
 *   res.status(error.statusCode).json(error.toResponse(requestId));
 * }
 * ```
 */

export interface ApiErrorResponse {
  error: string;
  code: string;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
  requestId?: string;
}

export const ErrorCodes = {
  // 400
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  MISSING_REQUIRED_FIELD: 'MISSING_REQUIRED_FIELD',

  // 401
  UNAUTHORIZED: 'UNAUTHORIZED',
  INVALID_OTP: 'INVALID_OTP',

  // 404
  NOT_FOUND: 'NOT_FOUND',

  // 409
  CONFLICT: 'CONFLICT',
  RESOURCE_LOCKED: 'RESOURCE_LOCKED',

  // 423
  ACCOUNT_LOCKED: 'ACCOUNT_LOCKED',

  // 500
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base API Error class
 */
export class ApiError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;
  readonly timestamp: Date;
  readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number,
    code: ErrorCode,
    details?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }

  toResponse(requestId?: string): ApiErrorResponse {
    return {
      error: this.name.replace('Error', ''),
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp.toISOString(),
      requestId,
    };
  }
}

// =============================================================================
// Validation Errors (400)
// =============================================================================

export class ValidationError extends ApiError {
  constructor(
    message: string = 'Validation failed',
    code: ErrorCode = ErrorCodes.VALIDATION_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, 400, code, details);
  }
}

export class MissingRequiredFieldError extends ValidationError {
  constructor(field: string) {
    super(`Missing required field: ${field}`, ErrorCodes.MISSING_REQUIRED_FIELD, { field });
  }
}

// =============================================================================
// Authentication Errors (401)
// =============================================================================

export class UnauthorizedError extends ApiError {
  constructor(
    message: string = 'Authentication required',
    code: ErrorCode = ErrorCodes.UNAUTHORIZED,
    details?: Record<string, unknown>
  ) {
    super(message, 401, code, details);
  }
}

export class InvalidOtpError extends UnauthorizedError {
  constructor(attemptsRemaining: number) {
    super('Invalid or expired OTP', ErrorCodes.INVALID_OTP, { attemptsRemaining });
  }
}

// =============================================================================
// Not Found Errors (404)
// =============================================================================

export class NotFoundError extends ApiError {
  constructor(message: string = 'Resource not found') {
    super(message, 404, ErrorCodes.NOT_FOUND);
  }
}

// =============================================================================
// Conflict Errors (409)
// =============================================================================

export class ConflictError extends ApiError {
  constructor(
    message: string = 'Resource conflict',
    code: ErrorCode = ErrorCodes.CONFLICT,
    details?: Record<string, unknown>
  ) {
    super(message, 409, code, details);
  }
}

/**
 * Another request holds the distributed lock for this resource
 */
export class ResourceLockedError extends ConflictError {
  constructor(category: string, resourceId: string) {
    super(
      'Another operation on this resource is in progress, please try again shortly',
      ErrorCodes.RESOURCE_LOCKED,
      { category, resourceId }
    );
  }
}

// =============================================================================
// Locked Errors (423)
// =============================================================================

export class AccountLockedError extends ApiError {
  constructor(message: string) {
    super(message, 423, ErrorCodes.ACCOUNT_LOCKED);
  }
}

// =============================================================================
// Internal Errors (500)
// =============================================================================

export class InternalError extends ApiError {
  constructor(
    message: string = 'An unexpected error occurred',
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    details?: Record<string, unknown>,
    isOperational: boolean = false
  ) {
    super(message, 500, code, details, isOperational);
  }
}

/**
 * The shared key-value store could not be reached.
 *
 * Raised by the store adapters so that callers can tell an infrastructure
 * failure apart from a rate-limit denial or a held lock.
 */
export class StoreUnavailableError extends InternalError {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    super('Coordination store unavailable', ErrorCodes.STORE_UNAVAILABLE, undefined, true);
    this.operation = operation;
    this.cause = cause;
  }
}
