/**
 * Off-ramp Validation Schemas
 *
 * Request bodies for the OTP and withdrawal endpoints.
 */

import { z } from 'zod';
import { AmountSchema, EmailSchema, NonEmptyStringSchema } from './common';

// =============================================================================
// OTP
// =============================================================================

export const OtpRequestSchema = z.object({
  email: EmailSchema,
});

export const OtpVerifySchema = z.object({
  email: EmailSchema,
  code: z.string().regex(/^\d{4,8}$/, 'Code must be 4 to 8 digits'),
});

// =============================================================================
// Withdrawals
// =============================================================================

export const WithdrawalRequestSchema = z.object({
  email: EmailSchema,
  walletId: NonEmptyStringSchema.max(128),
  amount: AmountSchema,
});

export type OtpRequestInput = z.infer<typeof OtpRequestSchema>;
export type OtpVerifyInput = z.infer<typeof OtpVerifySchema>;
export type WithdrawalRequestInput = z.infer<typeof WithdrawalRequestSchema>;
