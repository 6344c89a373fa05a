import pino from 'pino';
import { config } from './config/index.js';
import { checkConnection, createPool } from './db/pool.js';
import { runMigrations } from './db/migrate.js';
import { createApp } from './app.js';
import { createServices } from './services/container.js';
import { registerPriceBatchJob } from './services/jobs/price-batch-job.js';

const logger = pino({ name: 'server', level: config.LOG_LEVEL });

// Catch kills/OOM before pino can flush
process.on('uncaughtException', (err) => {
  console.error(`UNCAUGHT EXCEPTION: ${err.message}`);
  console.error(err.stack);
  process.exit(1);
});
process.on('unhandledRejection', (reason) => {
  console.error(`UNHANDLED REJECTION: ${String(reason)}`);
  process.exit(1);
});

async function boot(): Promise<void> {
  // Step 1: Config already validated by Zod at import time
  logger.info('Configuration validated');

  // Step 2: Test database connection
  const pool = createPool({
    connectionString: config.DATABASE_URL,
    maxConnections: config.DATABASE_POOL_MAX,
    logger: pino({ name: 'db', level: config.LOG_LEVEL }),
  });
  logger.info('Connecting to database...');
  await checkConnection(pool);
  logger.info('Database connected');

  // Step 3: Run migrations
  await runMigrations({
    databaseUrl: config.DATABASE_URL,
    logger: pino({ name: 'migrate', level: config.LOG_LEVEL }),
  });

  // Step 4: Wire services and scheduled jobs
  const services = createServices(pool);
  if (!services.primaryConfigured) {
    logger.warn('PRICECHARTING_API_KEY not set: catalog API tier disabled, batch runs will fail');
  }
  if (!services.oracleEnabled) {
    logger.warn('GEMINI_API_KEY not set: disambiguation disabled');
  }

  const frequency = await registerPriceBatchJob({
    scheduler: services.scheduler,
    controller: services.controller,
    settings: services.settings,
    timezone: config.PRICE_TRACKER_TIMEZONE,
  });
  logger.info({ frequency, timezone: config.PRICE_TRACKER_TIMEZONE }, 'Price batch job scheduled');

  // Step 5: Start Express
  const app = createApp({
    ...services,
    checkDatabase: () => checkConnection(pool),
  });
  const server = app.listen(config.PORT, () => {
    logger.info(`Server ready on port ${config.PORT}`);
  });

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down');
    services.scheduler.stopAllJobs();
    services.controller.cancel();
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Failed to close database pool');
          process.exit(1);
        },
      );
    });
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

boot().catch((err) => {
  const message = err instanceof Error ? err.message : String(err);
  const stack = err instanceof Error ? err.stack : '';
  console.error(`BOOT FAILED: ${message}`);
  console.error(`Stack: ${stack}`);
  process.exit(1);
});
