/**
 * Common Validation Schemas
 *
 * Reusable Zod schemas for common data types and patterns.
 */

import { z } from 'zod';

/** Email address (trimmed, lower-cased) */
export const EmailSchema = z.string().trim().toLowerCase().email();

/** Non-empty string */
export const NonEmptyStringSchema = z.string().min(1);

/** Positive decimal amount as a string, e.g. "125.50" */
export const AmountSchema = z
  .string()
  .regex(/^\d+(\.\d{1,18})?$/, 'Amount must be a decimal number')
  .refine((value) => Number(value) > 0, 'Amount must be greater than zero');
