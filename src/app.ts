/**
 * Express Application
 *
 * Builds the HTTP app from explicit dependencies so tests can pass an
 * in-memory store, a manual clock and fake collaborators.
 *
 * ## Usage
 *
 * ```typescript
 * const store = await initializeStore(config);
 * const app = createApp({ store, ...createCoreServices(store, config), otpIssuer, withdrawalProcessor }, config);
 * ```
 */

import express, { Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { getConfig, type AppConfig } from './config';
import { errorHandler, notFoundHandler } from './errors';
import { LockRegistry, systemClock, type Clock, type KeyValueStore } from './infrastructure';
import { metricsMiddleware } from './middleware/metrics';
import { requestLogger } from './middleware/requestLogger';
import { registerRoutes, type RouteDependencies } from './routes';
import { AccountLockoutService } from './services/accountLockout';
import { createPolicyRegistry, RateLimitCoordinator } from './services/rateLimiting';

export type AppDependencies = RouteDependencies;

export interface CoreServices {
  coordinator: RateLimitCoordinator;
  locks: LockRegistry;
  accountLockout: AccountLockoutService;
}

/**
 * Wire the rate limiter, lock registry and account lockout onto one store
 */
export function createCoreServices(
  store: KeyValueStore,
  config: AppConfig = getConfig(),
  clock: Clock = systemClock
): CoreServices {
  const policies = createPolicyRegistry(config.rateLimit.policies);

  return {
    coordinator: new RateLimitCoordinator(store, policies, clock),
    locks: new LockRegistry(store, { ttlSeconds: config.locks.ttlSeconds, clock }),
    accountLockout: new AccountLockoutService(store, {
      maxFailedAttempts: config.accountLockout.maxFailedAttempts,
      lockoutMinutes: config.accountLockout.lockoutMinutes,
      clock,
    }),
  };
}

export function createApp(deps: AppDependencies, config: AppConfig = getConfig()): Express {
  const app = express();

  // req.ip becomes the address appended by the one trusted proxy
  if (config.server.trustProxy) {
    app.set('trust proxy', 1);
  }

  app.use(helmet());
  app.use(
    cors({
      origin: config.server.nodeEnv === 'development' ? true : config.server.corsOrigins,
    })
  );
  app.use(express.json({ limit: '100kb' }));

  app.use(requestLogger);
  app.use(metricsMiddleware());

  registerRoutes(app, deps);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
