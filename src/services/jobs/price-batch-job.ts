import { z } from 'zod';
import type { BatchJobController } from '../price-tracker/batch-job.js';
import { SETTING_KEYS, type SettingsStore } from '../price-tracker/settings-store.js';
import type { JobScheduler } from './scheduler.js';

export const PRICE_BATCH_JOB = 'price-batch';

export const updateFrequencySchema = z.enum(['daily', 'every_3_days', 'weekly']);
export type UpdateFrequency = z.infer<typeof updateFrequencySchema>;

export const DEFAULT_FREQUENCY: UpdateFrequency = 'weekly';

/** All runs start at 03:00 local time in the tracker's timezone. */
export const FREQUENCY_CRON: Record<UpdateFrequency, string> = {
  daily: '0 3 * * *',
  every_3_days: '0 3 */3 * *',
  weekly: '0 3 * * 0',
};

export interface PriceBatchJobDeps {
  scheduler: Pick<JobScheduler, 'registerJob'>;
  controller: Pick<BatchJobController, 'run'>;
  settings: SettingsStore;
  timezone: string;
}

export async function readFrequency(settings: SettingsStore): Promise<UpdateFrequency> {
  const parsed = updateFrequencySchema.safeParse(await settings.getSetting(SETTING_KEYS.frequency));
  return parsed.success ? parsed.data : DEFAULT_FREQUENCY;
}

export async function registerPriceBatchJob(deps: PriceBatchJobDeps): Promise<UpdateFrequency> {
  const frequency = await readFrequency(deps.settings);
  deps.scheduler.registerJob(
    PRICE_BATCH_JOB,
    FREQUENCY_CRON[frequency],
    async () => {
      await deps.controller.run();
    },
    { timezone: deps.timezone },
  );
  return frequency;
}

/** Persist the new frequency, then move the cron schedule. */
export async function changeFrequency(
  deps: { scheduler: Pick<JobScheduler, 'rescheduleJob'>; settings: SettingsStore },
  frequency: UpdateFrequency,
): Promise<void> {
  await deps.settings.setSetting(SETTING_KEYS.frequency, frequency);
  deps.scheduler.rescheduleJob(PRICE_BATCH_JOB, FREQUENCY_CRON[frequency]);
}
