/**
 * Request Validation
 *
 * Parses request data against a Zod schema and raises a ValidationError
 * (400) that the error handler renders.
 */

import type { ZodError, ZodIssue, ZodTypeAny, z } from 'zod';
import { ErrorCodes, ValidationError } from '../../errors/ApiError';

/**
 * Format Zod errors into a user-friendly message
 */
export function formatZodError(error: ZodError<unknown>): string {
  return error.issues
    .map((e: ZodIssue) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * @throws ValidationError when the data does not match the schema
 *
 * @example
 * const { email } = parseBody(OtpRequestSchema, req.body);
 */
export function parseBody<T extends ZodTypeAny>(schema: T, data: unknown): z.infer<T> {
  const result = schema.safeParse(data);

  if (!result.success) {
    throw new ValidationError(formatZodError(result.error), ErrorCodes.VALIDATION_ERROR, {
      issues: result.error.issues.map((e: ZodIssue) => ({
        field: e.path.join('.'),
        message: e.message,
        code: e.code,
      })),
    });
  }

  return result.data;
}
