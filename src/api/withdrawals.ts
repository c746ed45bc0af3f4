/**
 * Withdrawal Routes
 *
 * POST /api/v1/withdrawals - rate limited under subject "withdrawal", then
 * run under the "withdrawals" lock for the wallet so two requests never move
 * the same balance at once. A store outage fails closed.
 */

import { Router, Request, Response } from 'express';
import { ResourceLockedError } from '../errors/ApiError';
import { asyncHandler } from '../errors/errorHandler';
import type { LockRegistry } from '../infrastructure/distributedLock';
import { fromBody, rateLimitInterceptor } from '../middleware/rateLimit';
import type { IRateLimitCoordinator } from '../services/rateLimiting';
import { createLogger } from '../utils/logger';
import { parseBody, WithdrawalRequestSchema } from './schemas';
import type { WithdrawalProcessor } from './types';

const log = createLogger('WITHDRAWAL');

export const WITHDRAWAL_SUBJECT = 'withdrawal';
export const WITHDRAWAL_LOCK_CATEGORY = 'withdrawals';

export interface WithdrawalRouterDependencies {
  coordinator: IRateLimitCoordinator;
  locks: LockRegistry;
  withdrawalProcessor: WithdrawalProcessor;
}

export function createWithdrawalRouter(deps: WithdrawalRouterDependencies): Router {
  const { coordinator, locks, withdrawalProcessor } = deps;
  const lock = locks.get(WITHDRAWAL_LOCK_CATEGORY);
  const router = Router();

  router.post(
    '/',
    rateLimitInterceptor({ coordinator, subject: WITHDRAWAL_SUBJECT, identifier: fromBody('email') }),
    asyncHandler(async (req: Request, res: Response) => {
      const request = parseBody(WithdrawalRequestSchema, req.body);

      const outcome = await lock.withLock(request.walletId, () => withdrawalProcessor.initiate(request));
      if (!outcome.success) {
        throw new ResourceLockedError(WITHDRAWAL_LOCK_CATEGORY, request.walletId);
      }

      log.info('Withdrawal initiated', {
        walletId: request.walletId,
        withdrawalId: outcome.result.withdrawalId,
      });
      res.status(202).json(outcome.result);
    })
  );

  return router;
}
