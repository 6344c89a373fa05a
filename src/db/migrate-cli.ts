import pino from 'pino';
import { config } from '../config/index.js';
import { toErrorObject } from '../utils/errors.js';
import { runMigrations } from './migrate.js';

// npm run migrate
const logger = pino({ name: 'migrate', level: config.LOG_LEVEL });

runMigrations({ databaseUrl: config.DATABASE_URL, logger }).then(
  () => process.exit(0),
  (err: unknown) => {
    logger.error({ err: toErrorObject(err) }, 'Migration failed');
    process.exit(1);
  },
);
