import pg from 'pg';
import pino from 'pino';
import type { Logger } from '../services/logger/correlation.js';
import { toErrorObject } from '../utils/errors.js';

export interface DatabaseOptions {
  connectionString: string;
  maxConnections?: number;
  logger?: Logger;
}

/** One pool per process, shared by the catalog, snapshot and settings stores. */
export function createPool(options: DatabaseOptions): pg.Pool {
  const log = options.logger ?? pino({ name: 'db' });
  const pool = new pg.Pool({
    connectionString: options.connectionString,
    max: options.maxConnections ?? 10,
  });

  // An idle client dropped by the server must not crash the process
  pool.on('error', (err) => {
    log.error({ err: toErrorObject(err) }, 'Idle database client failed');
  });
  return pool;
}

export async function checkConnection(pool: Pick<pg.Pool, 'query'>): Promise<void> {
  await pool.query('SELECT 1');
}
