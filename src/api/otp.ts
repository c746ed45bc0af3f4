/**
 * OTP Routes
 *
 * POST /api/v1/otp/request  - issue a one-time code (rate limited, subject "otp")
 * POST /api/v1/otp/verify   - check a code; repeated failures lock the account
 */

import { Router, Request, Response } from 'express';
import { AccountLockedError, InvalidOtpError } from '../errors/ApiError';
import { asyncHandler } from '../errors/errorHandler';
import { fromBody, rateLimitInterceptor } from '../middleware/rateLimit';
import type { SubjectLockout } from '../services/accountLockout';
import type { IRateLimitCoordinator } from '../services/rateLimiting';
import { createLogger } from '../utils/logger';
import { maskEmail } from '../utils/redact';
import { OtpRequestSchema, OtpVerifySchema, parseBody } from './schemas';
import type { OtpIssuer } from './types';

const log = createLogger('OTP');

export const OTP_SUBJECT = 'otp';

export interface OtpRouterDependencies {
  coordinator: IRateLimitCoordinator;
  lockout: SubjectLockout;
  otpIssuer: OtpIssuer;
}

export function createOtpRouter(deps: OtpRouterDependencies): Router {
  const { coordinator, lockout, otpIssuer } = deps;
  const router = Router();

  /**
   * POST /api/v1/otp/request
   */
  router.post(
    '/request',
    rateLimitInterceptor({ coordinator, subject: OTP_SUBJECT, identifier: fromBody('email') }),
    asyncHandler(async (req: Request, res: Response) => {
      const { email } = parseBody(OtpRequestSchema, req.body);

      const status = await lockout.isAccountLocked(email);
      if (status.locked) {
        throw new AccountLockedError(status.message);
      }

      await otpIssuer.issue(email);
      log.info('OTP issued', { email: maskEmail(email) });

      res.status(202).json({ message: 'OTP sent' });
    })
  );

  /**
   * POST /api/v1/otp/verify
   */
  router.post(
    '/verify',
    asyncHandler(async (req: Request, res: Response) => {
      const { email, code } = parseBody(OtpVerifySchema, req.body);

      const status = await lockout.isAccountLocked(email);
      if (status.locked) {
        throw new AccountLockedError(status.message);
      }

      const valid = await otpIssuer.verify(email, code);
      if (!valid) {
        const failure = await lockout.incrementFailedAttempts(email);
        if (failure.locked) {
          throw new AccountLockedError(lockout.lockedMessage());
        }
        throw new InvalidOtpError(failure.attemptsRemaining);
      }

      await lockout.resetFailedAttempts(email);
      res.json({ verified: true });
    })
  );

  return router;
}
