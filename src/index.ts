/**
 * Off-ramp Guard API Server
 *
 * Main entry point. Connects the coordination store, wires the rate limiter,
 * locks and account lockout into the Express app and starts listening.
 *
 * Run directly for development; embedders call startServer() with their
 * own OTP and withdrawal collaborators.
 */

import { createServer, type Server } from 'http';
import { createApp, createCoreServices } from './app';
import type { OtpIssuer, WithdrawalProcessor } from './api/types';
import { getConfig, type AppConfig } from './config';
import { initializeStore, shutdownStore, type KeyValueStore } from './infrastructure';
import { metricsService } from './observability';
import { AcceptingWithdrawalProcessor, LoggingOtpIssuer } from './services/devCollaborators';
import { createLogger, extractError, setLogLevel } from './utils/logger';

const log = createLogger('SERVER');

export interface ServerCollaborators {
  otpIssuer: OtpIssuer;
  withdrawalProcessor: WithdrawalProcessor;
}

export interface RunningServer {
  server: Server;
  shutdown: () => Promise<void>;
}

/**
 * Start the HTTP server
 *
 * @param collaborators - builds the OTP and withdrawal collaborators once the store is up
 */
export async function startServer(
  collaborators: (store: KeyValueStore) => ServerCollaborators,
  config: AppConfig = getConfig()
): Promise<RunningServer> {
  setLogLevel(config.logging.level);
  metricsService.enableDefaultMetrics();

  const store = await initializeStore(config);
  const app = createApp({ store, ...createCoreServices(store, config), ...collaborators(store) }, config);
  const server = createServer(app);

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(config.server.port, () => {
      server.off('error', reject);
      resolve();
    });
  });

  log.info('Off-ramp guard API server started', {
    port: config.server.port,
    environment: config.server.nodeEnv,
    store: store.getType(),
  });

  let closing: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    closing ??= (async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      await shutdownStore();
      log.info('Server closed gracefully');
    })();
    return closing;
  };

  return { server, shutdown };
}

// Graceful shutdown configuration
const SHUTDOWN_TIMEOUT_MS = 30000;

async function main(): Promise<void> {
  const config = getConfig();
  if (config.server.nodeEnv === 'production') {
    throw new Error('Development collaborators cannot run in production; embed startServer() instead');
  }

  const { shutdown } = await startServer(
    (store) => ({
      otpIssuer: new LoggingOtpIssuer(store),
      withdrawalProcessor: new AcceptingWithdrawalProcessor(),
    }),
    config
  );

  const handleShutdown = (signal: string) => {
    log.info(`${signal} received, starting graceful shutdown`);

    // Force exit if draining takes too long
    const forceExitTimeout = setTimeout(() => {
      log.error('Graceful shutdown timed out, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExitTimeout.unref();

    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error('Error during shutdown', extractError(error));
        process.exit(1);
      }
    );
  };

  process.on('SIGTERM', () => handleShutdown('SIGTERM'));
  process.on('SIGINT', () => handleShutdown('SIGINT'));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    log.error('Failed to start server', extractError(error));
    process.exit(1);
  });
}
