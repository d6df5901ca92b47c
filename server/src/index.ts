import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config';
import { openDatabase, closeDatabase } from './db';
import { listen } from './server';
import { ServiceChecker, SystemctlStateProvider } from './services/checker';
import { CheckCycleScheduler } from './services/scheduler/CheckCycleScheduler';
import { StatusQueryService } from './services/status/StatusQueryService';
import { StoreRegistry } from './stores';
import logger from './utils/logger';

dotenv.config();

async function start(): Promise<void> {
  const config = loadConfig();
  const db = openDatabase(config.databasePath);
  const stores = StoreRegistry.create(db);

  const checker = new ServiceChecker(new SystemctlStateProvider(), {
    timeoutMs: config.probeTimeoutMs,
  });
  const statusService = new StatusQueryService(config, stores.statusRecords, checker);

  const scheduler = new CheckCycleScheduler(statusService, {
    intervalMs: config.checkIntervalMs,
    cycleTimeoutMs: config.cycleTimeoutMs,
  });

  const app = createApp({ config, statusService, logger });

  logger.info(
    { application: config.applicationName, dependencies: config.dependencies, host: config.monitorHost },
    'monitoring configured'
  );

  const server = await listen(app, config.port, config.host);
  logger.info({ port: config.port, host: config.host }, 'server started');

  server.on('error', (error) => {
    logger.fatal({ err: error }, 'server failed');
    process.exit(1);
  });

  scheduler.start();

  // Graceful shutdown
  const shutdown = (): void => {
    logger.info('shutting down');

    scheduler.stop();

    server.close(() => {
      closeDatabase(db);
      logger.info('server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds if server doesn't close gracefully
    const forceExitTimer = setTimeout(() => {
      logger.warn('forcing exit after timeout');
      process.exit(0);
    }, 10000);
    forceExitTimer.unref();
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

start().catch((error: unknown) => {
  logger.fatal({ err: error }, 'failed to start server');
  process.exit(1);
});
