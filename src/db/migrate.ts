import { runner } from 'node-pg-migrate';
import path from 'node:path';
import pino from 'pino';
import type { Logger } from '../services/logger/correlation.js';

export interface MigrationOptions {
  databaseUrl: string;
  /** Defaults to ./migrations under the working directory */
  dir?: string;
  logger?: Logger;
}

/**
 * Apply pending SQL migrations (catalog_items, price_snapshots,
 * system_settings). Resolves to the names applied by this call.
 */
export async function runMigrations(options: MigrationOptions): Promise<string[]> {
  const log = options.logger ?? pino({ name: 'migrate' });
  const applied = await runner({
    databaseUrl: options.databaseUrl,
    dir: options.dir ?? path.resolve('migrations'),
    direction: 'up',
    migrationsTable: 'pgmigrations',
    log: (msg: string) => log.debug(msg),
  });

  const names = applied.map((m) => m.name);
  if (names.length === 0) {
    log.info('Schema up to date');
  } else {
    log.info({ applied: names }, 'Migrations applied');
  }
  return names;
}
