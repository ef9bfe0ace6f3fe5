import http from 'node:http';
import { createApp } from './app';
import { getConfig } from './core/config';
import { getPoolStatus, pool, queryWithRetry } from './core/db';
import { schedulerTracker } from './core/schedulerTracker';
import { logger } from './core/logger';
import { getSession } from './core/session';
import { createServices } from './loaders/services';
import { getStartupHealth, runStartupTasks, stopStartupSubscriptions } from './loaders/startup';
import { initSchedulers, stopSchedulers } from './schedulers';
import { getErrorMessage, toError } from './utils/errorUtils';

const config = getConfig();
const services = createServices(config);

let isShuttingDown = false;
let isReady = false;

process.on('uncaughtException', (error) => {
  logger.error('[Process] Uncaught Exception', { error });
  if (error.message.includes('EADDRINUSE')) {
    process.exit(1);
  }
});

process.on('unhandledRejection', (reason) => {
  logger.error('[Process] Unhandled Rejection', { error: toError(reason) });
});

const app = createApp({
  config,
  services,
  session: getSession(),
  readiness: async () => {
    const startupHealth = getStartupHealth();
    if (isShuttingDown) return { ready: false, reason: 'shutting_down' };
    if (!isReady) return { ready: false, reason: 'starting_up', details: { startupHealth } };
    try {
      await queryWithRetry('SELECT 1');
      return {
        ready: true,
        details: {
          startupHealth,
          pool: getPoolStatus(),
          schedulers: schedulerTracker.getSchedulerStatuses(),
          uptime: process.uptime(),
        },
      };
    } catch (error: unknown) {
      return { ready: false, reason: 'database_unavailable', details: { error: getErrorMessage(error) } };
    }
  },
});

const httpServer = http.createServer(app);

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;
  isReady = false;
  logger.info(`[Shutdown] Starting graceful shutdown (${signal})...`);

  const shutdownTimeout = setTimeout(() => {
    logger.error('[Shutdown] Timeout exceeded, forcing exit');
    process.exit(1);
  }, 30000);

  try {
    stopSchedulers();
    stopStartupSubscriptions();
    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
      setTimeout(resolve, 5000);
    });
    await pool.end();
    clearTimeout(shutdownTimeout);
    logger.info('[Shutdown] Complete');
    process.exit(0);
  } catch (error: unknown) {
    logger.error('[Shutdown] Error', { error: toError(error) });
    clearTimeout(shutdownTimeout);
    process.exit(1);
  }
}

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    logger.info(`[Process] Received ${signal} signal`);
    gracefulShutdown(signal).catch((error: unknown) => {
      logger.error('[Shutdown] Failed', { error: toError(error) });
    });
  });
}

httpServer.on('error', (err: Error) => {
  logger.error('[Startup] Server failed to start', { error: err });
  process.exit(1);
});

httpServer.listen(config.port, '0.0.0.0', () => {
  logger.info(`[Startup] HTTP server listening on port ${config.port}`, {
    extra: { environment: config.env, database: config.databaseUrl ? 'configured' : 'MISSING' },
  });

  runStartupTasks(services.events)
    .then(() => {
      isReady = true;
      initSchedulers(services.approvals, config);
    })
    .catch((err: unknown) => {
      logger.error('[Startup] Initialization failed', { error: toError(err) });
    });
});
