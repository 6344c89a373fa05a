import { describe, it, expect, vi } from 'vitest';
import { JobScheduler, type TaskFactory } from '../../services/jobs/scheduler.js';
import {
  FREQUENCY_CRON,
  PRICE_BATCH_JOB,
  changeFrequency,
  readFrequency,
  registerPriceBatchJob,
} from '../../services/jobs/price-batch-job.js';
import type { BatchJobController } from '../../services/price-tracker/batch-job.js';
import { SETTING_KEYS } from '../../services/price-tracker/settings-store.js';
import { InMemorySettingsStore, silentLogger } from '../helpers/fakes.js';

interface FakeTask {
  schedule: string;
  timezone?: string;
  tick: () => Promise<void>;
  stopped: boolean;
}

function fakeFactory() {
  const tasks: FakeTask[] = [];
  const factory: TaskFactory = (schedule, tick, options) => {
    const task: FakeTask = { schedule, timezone: options.timezone, tick, stopped: false };
    tasks.push(task);
    return {
      start: () => {
        task.stopped = false;
      },
      stop: () => {
        task.stopped = true;
      },
    };
  };
  return { tasks, factory };
}

describe('JobScheduler', () => {
  it('runs a registered job on each tick and records its status', async () => {
    const { tasks, factory } = fakeFactory();
    const scheduler = new JobScheduler(factory, silentLogger);
    const fn = vi.fn(async () => {});

    scheduler.registerJob('nightly', '0 3 * * *', fn, { timezone: 'Asia/Tokyo' });
    await tasks[0]?.tick();

    expect(tasks[0]).toMatchObject({ schedule: '0 3 * * *', timezone: 'Asia/Tokyo' });
    expect(fn).toHaveBeenCalledTimes(1);
    expect(scheduler.getJobStatuses().nightly).toMatchObject({ isRunning: false, runCount: 1, lastError: null });
  });

  it('skips a tick while the previous run is still going', async () => {
    const { tasks, factory } = fakeFactory();
    const scheduler = new JobScheduler(factory, silentLogger);
    let release: () => void = () => {};
    const fn = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );
    scheduler.registerJob('slow', '* * * * *', fn);

    const first = tasks[0]?.tick();
    await tasks[0]?.tick();
    expect(scheduler.getJobStatuses().slow?.isRunning).toBe(true);

    release();
    await first;

    expect(fn).toHaveBeenCalledTimes(1);
    expect(scheduler.getJobStatuses().slow?.runCount).toBe(1);
  });

  it('keeps the error message of a failed run', async () => {
    const { tasks, factory } = fakeFactory();
    const scheduler = new JobScheduler(factory, silentLogger);
    scheduler.registerJob('broken', '* * * * *', async () => {
      throw new Error('boom');
    });

    await tasks[0]?.tick();

    expect(scheduler.getJobStatuses().broken).toMatchObject({ lastError: 'boom', runCount: 0, isRunning: false });
  });

  it('rejects an invalid cron expression', () => {
    const scheduler = new JobScheduler(fakeFactory().factory, silentLogger);

    expect(() => scheduler.registerJob('bad', 'every sunday', async () => {})).toThrow(
      'Invalid cron expression for bad: every sunday',
    );
  });

  it('replaces the task when a job is rescheduled', () => {
    const { tasks, factory } = fakeFactory();
    const scheduler = new JobScheduler(factory, silentLogger);
    scheduler.registerJob('nightly', '0 3 * * *', async () => {}, { timezone: 'Asia/Tokyo' });

    expect(scheduler.rescheduleJob('nightly', '0 3 * * 0')).toBe(true);
    expect(scheduler.rescheduleJob('missing', '0 3 * * 0')).toBe(false);

    expect(tasks.map((t) => [t.schedule, t.stopped])).toEqual([
      ['0 3 * * *', true],
      ['0 3 * * 0', false],
    ]);
    expect(tasks[1]?.timezone).toBe('Asia/Tokyo');
    expect(scheduler.getJobStatuses().nightly?.schedule).toBe('0 3 * * 0');
  });
});

describe('price batch job', () => {
  it('defaults to a weekly schedule for a missing or unknown frequency', async () => {
    const settings = new InMemorySettingsStore();
    expect(await readFrequency(settings)).toBe('weekly');

    settings.values.set(SETTING_KEYS.frequency, 'hourly');
    expect(await readFrequency(settings)).toBe('weekly');
  });

  it('registers the batch on the stored frequency and runs the controller', async () => {
    const { tasks, factory } = fakeFactory();
    const scheduler = new JobScheduler(factory, silentLogger);
    const settings = new InMemorySettingsStore();
    settings.values.set(SETTING_KEYS.frequency, 'daily');
    const run = vi.fn(async () => null);
    const controller: Pick<BatchJobController, 'run'> = { run };

    const frequency = await registerPriceBatchJob({ scheduler, controller, settings, timezone: 'Asia/Tokyo' });
    await tasks[0]?.tick();

    expect(frequency).toBe('daily');
    expect(tasks[0]).toMatchObject({ schedule: FREQUENCY_CRON.daily, timezone: 'Asia/Tokyo' });
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('persists a frequency change and moves the schedule', async () => {
    const settings = new InMemorySettingsStore();
    const rescheduleJob = vi.fn(() => true);

    await changeFrequency({ scheduler: { rescheduleJob }, settings }, 'every_3_days');

    expect(settings.values.get(SETTING_KEYS.frequency)).toBe('every_3_days');
    expect(rescheduleJob).toHaveBeenCalledWith(PRICE_BATCH_JOB, '0 3 */3 * *');
  });
});
