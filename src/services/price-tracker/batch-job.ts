import pino from 'pino';
import { getErrorMessage, toErrorObject } from '../../utils/errors.js';
import type { CatalogProvider } from '../catalog/catalog-provider.js';
import type { Logger } from '../logger/correlation.js';
import type { BatchRevaluationRunner } from './batch-runner.js';
import { SETTING_KEYS, type BatchRunStats, type SettingsStore, type TrackerStatus } from './settings-store.js';

export interface BatchJobDeps {
  runner: Pick<BatchRevaluationRunner, 'runBatchRevaluation'>;
  catalog: CatalogProvider;
  settings: SettingsStore;
  logger?: Logger;
}

export type RunNowResult = { status: 'started' } | { status: 'already_running' };

/**
 * Owns the single in-flight batch run: overlap protection, cancellation and
 * the persisted tracker status.
 */
export class BatchJobController {
  private current: { controller: AbortController; promise: Promise<BatchRunStats | null> } | null = null;
  private readonly log: Logger;

  constructor(private readonly deps: BatchJobDeps) {
    this.log = deps.logger ?? pino({ name: 'price-batch' });
  }

  get isRunning(): boolean {
    return this.current !== null;
  }

  /**
   * Run to completion. Resolves to null when a run is already in progress
   * or the catalog is empty.
   */
  async run(): Promise<BatchRunStats | null> {
    if (this.current) {
      this.log.warn('Batch run already in progress, skipping');
      return null;
    }

    const controller = new AbortController();
    const promise = this.execute(controller.signal);
    this.current = { controller, promise };
    try {
      return await promise;
    } finally {
      this.current = null;
    }
  }

  /** Start a run in the background, for manual triggers. */
  runNow(): RunNowResult {
    if (this.current) return { status: 'already_running' };
    this.run().catch((err: unknown) => {
      this.log.error({ err: toErrorObject(err) }, 'Manual batch run failed');
    });
    return { status: 'started' };
  }

  /** Cooperative: the run stops at the next item boundary. */
  cancel(): boolean {
    if (!this.current) return false;
    this.current.controller.abort();
    this.log.info('Batch run cancellation requested');
    return true;
  }

  private async execute(signal: AbortSignal): Promise<BatchRunStats | null> {
    await this.setStatus('running');
    try {
      const items = await this.deps.catalog.listItems();
      if (items.length === 0) {
        this.log.warn('Catalog is empty, nothing to revalue');
        await this.setStatus('idle');
        return null;
      }

      const stats = await this.deps.runner.runBatchRevaluation(items, { signal });
      await this.setStatus('idle');
      return stats;
    } catch (err) {
      await this.setStatus('failed');
      await this.deps.settings
        .setSetting(SETTING_KEYS.lastError, getErrorMessage(err).slice(0, 500))
        .catch((writeErr: unknown) => {
          this.log.warn({ err: toErrorObject(writeErr) }, 'Failed to record batch error');
        });
      throw err;
    }
  }

  private async setStatus(status: TrackerStatus): Promise<void> {
    try {
      await this.deps.settings.setSetting(SETTING_KEYS.status, status);
    } catch (err) {
      this.log.warn({ status, err: toErrorObject(err) }, 'Failed to record tracker status');
    }
  }
}
