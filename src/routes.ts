/**
 * Route Registration
 *
 * Centralizes route mounting to keep app.ts focused on middleware wiring.
 */

import type { Express, RequestHandler } from 'express';
import { createHealthRouter } from './api/health';
import { createOtpRouter, OTP_SUBJECT } from './api/otp';
import { createWithdrawalRouter } from './api/withdrawals';
import type { OtpIssuer, WithdrawalProcessor } from './api/types';
import type { LockRegistry } from './infrastructure/distributedLock';
import type { KeyValueStore } from './infrastructure/store';
import { metricsHandler } from './middleware/metrics';
import type { AccountLockoutService } from './services/accountLockout';
import type { IRateLimitCoordinator } from './services/rateLimiting';

export interface RouteDependencies {
  store: KeyValueStore;
  coordinator: IRateLimitCoordinator;
  locks: LockRegistry;
  accountLockout: AccountLockoutService;
  otpIssuer: OtpIssuer;
  withdrawalProcessor: WithdrawalProcessor;
}

type RouteDefinition = {
  method: 'use' | 'get';
  path: string;
  handler: RequestHandler;
};

export function registerRoutes(app: Express, deps: RouteDependencies): void {
  const routes: RouteDefinition[] = [
    { method: 'use', path: '/health', handler: createHealthRouter(deps.store) },
    { method: 'get', path: '/metrics', handler: metricsHandler },
    {
      method: 'use',
      path: '/api/v1/otp',
      handler: createOtpRouter({
        coordinator: deps.coordinator,
        lockout: deps.accountLockout.forSubject(OTP_SUBJECT),
        otpIssuer: deps.otpIssuer,
      }),
    },
    {
      method: 'use',
      path: '/api/v1/withdrawals',
      handler: createWithdrawalRouter({
        coordinator: deps.coordinator,
        locks: deps.locks,
        withdrawalProcessor: deps.withdrawalProcessor,
      }),
    },
  ];

  for (const route of routes) {
    if (route.method === 'get') {
      app.get(route.path, route.handler);
    } else {
      app.use(route.path, route.handler);
    }
  }
}
