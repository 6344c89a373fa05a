import type pg from 'pg';
import { z } from 'zod';
import { PersistenceError } from '../../utils/errors.js';

export const SETTING_KEYS = {
  status: 'price_tracker_status',
  lastRun: 'price_tracker_last_run',
  lastError: 'price_tracker_last_error',
  frequency: 'price_update_frequency',
} as const;

export type TrackerStatus = 'running' | 'idle' | 'failed';

export interface SettingsStore {
  getSetting(key: string): Promise<string | null>;
  setSetting(key: string, value: string): Promise<void>;
}

export class PgSettingsStore implements SettingsStore {
  constructor(private readonly pool: pg.Pool) {}

  async getSetting(key: string): Promise<string | null> {
    try {
      const { rows } = await this.pool.query<{ value: string | null }>(
        'SELECT value FROM system_settings WHERE key = $1',
        [key],
      );
      return rows.length > 0 ? rows[0].value : null;
    } catch (err) {
      throw new PersistenceError('settings read', key, err);
    }
  }

  async setSetting(key: string, value: string): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO system_settings (key, value, updated_at)
         VALUES ($1, $2, NOW())
         ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, updated_at = NOW()`,
        [key, value],
      );
    } catch (err) {
      throw new PersistenceError('settings write', key, err);
    }
  }
}

export const batchRunStatsSchema = z.object({
  updated: z.number().int(),
  failed: z.number().int(),
  skipped: z.number().int(),
  total: z.number().int(),
  durationSec: z.number(),
  catalogSize: z.number().int(),
  aborted: z.boolean(),
  exchangeRate: z.number(),
  rateIsFallback: z.boolean(),
  startedAt: z.string(),
  finishedAt: z.string(),
});

export type BatchRunStats = z.infer<typeof batchRunStatsSchema>;

/** Last persisted run statistics, or null when absent or unreadable. */
export async function readLastRunStats(settings: SettingsStore): Promise<BatchRunStats | null> {
  const raw = await settings.getSetting(SETTING_KEYS.lastRun);
  if (!raw) return null;
  try {
    const parsed = batchRunStatsSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}
