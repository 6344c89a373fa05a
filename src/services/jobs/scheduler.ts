import cron from 'node-cron';
import pino from 'pino';
import { getErrorMessage, toErrorObject } from '../../utils/errors.js';
import type { Logger } from '../logger/correlation.js';

export interface ScheduledTaskHandle {
  start(): void;
  stop(): void;
}

export type TaskFactory = (
  schedule: string,
  tick: () => Promise<void>,
  options: { timezone?: string },
) => ScheduledTaskHandle;

const cronTaskFactory: TaskFactory = (schedule, tick, options) => cron.schedule(schedule, tick, options);

export interface JobStatus {
  schedule: string;
  isRunning: boolean;
  lastRun: Date | null;
  lastError: string | null;
  runCount: number;
}

interface JobEntry extends JobStatus {
  task: ScheduledTaskHandle;
  fn: () => Promise<void>;
  timezone?: string;
}

/**
 * Cron job registry with overlap protection: a tick that fires while the
 * previous one is still running is skipped.
 */
export class JobScheduler {
  private readonly jobs = new Map<string, JobEntry>();
  private readonly log: Logger;

  constructor(
    private readonly createTask: TaskFactory = cronTaskFactory,
    logger?: Logger,
  ) {
    this.log = logger ?? pino({ name: 'scheduler' });
  }

  /**
   * Register a background job.
   *
   * @param schedule - Cron expression (e.g. '0 3 * * 0' for Sundays at 03:00)
   */
  registerJob(name: string, schedule: string, fn: () => Promise<void>, options: { timezone?: string } = {}): void {
    if (this.jobs.has(name)) {
      this.log.warn({ job: name }, 'Job already registered, skipping');
      return;
    }
    if (!cron.validate(schedule)) {
      throw new Error(`Invalid cron expression for ${name}: ${schedule}`);
    }

    const entry: JobEntry = {
      schedule,
      fn,
      timezone: options.timezone,
      isRunning: false,
      lastRun: null,
      lastError: null,
      runCount: 0,
      task: this.createTask(schedule, () => this.tick(name), { timezone: options.timezone }),
    };
    this.jobs.set(name, entry);
    this.log.info({ job: name, schedule, timezone: options.timezone }, 'Job registered');
  }

  /** Swap a job's cron expression, keeping its run history. */
  rescheduleJob(name: string, schedule: string): boolean {
    const job = this.jobs.get(name);
    if (!job) return false;
    if (!cron.validate(schedule)) {
      throw new Error(`Invalid cron expression for ${name}: ${schedule}`);
    }

    job.task.stop();
    job.task = this.createTask(schedule, () => this.tick(name), { timezone: job.timezone });
    job.schedule = schedule;
    this.log.info({ job: name, schedule }, 'Job rescheduled');
    return true;
  }

  getJobStatuses(): Record<string, JobStatus> {
    const statuses: Record<string, JobStatus> = {};
    for (const [name, entry] of this.jobs) {
      statuses[name] = {
        schedule: entry.schedule,
        isRunning: entry.isRunning,
        lastRun: entry.lastRun,
        lastError: entry.lastError,
        runCount: entry.runCount,
      };
    }
    return statuses;
  }

  /** For graceful shutdown. */
  stopAllJobs(): void {
    for (const [name, entry] of this.jobs) {
      entry.task.stop();
      this.log.info({ job: name }, 'Job stopped');
    }
  }

  private async tick(name: string): Promise<void> {
    const job = this.jobs.get(name);
    if (!job) return;

    if (job.isRunning) {
      this.log.warn({ job: name }, 'Job still running, skipping this cycle');
      return;
    }

    job.isRunning = true;
    const startTime = Date.now();

    try {
      await job.fn();
      job.lastRun = new Date();
      job.lastError = null;
      job.runCount++;
      this.log.info({ job: name, durationMs: Date.now() - startTime, runCount: job.runCount }, 'Job completed');
    } catch (err) {
      job.lastError = getErrorMessage(err);
      this.log.error({ job: name, err: toErrorObject(err), durationMs: Date.now() - startTime }, 'Job failed');
    } finally {
      job.isRunning = false;
    }
  }
}
