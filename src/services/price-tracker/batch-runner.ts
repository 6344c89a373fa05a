import type Bottleneck from 'bottleneck';
import pino from 'pino';
import { systemClock, type Clock } from '../../utils/clock.js';
import { ConfigurationError, toErrorObject } from '../../utils/errors.js';
import type { CandidateSelector } from '../appraisal/candidate-selector.js';
import { identityFromItem, type ItemRecord } from '../catalog/catalog-provider.js';
import { roundForCurrency, type CurrencyConversion } from '../exchange-rate/exchange-rate-service.js';
import { createPipelineContext, type Logger } from '../logger/correlation.js';
import type { SourceFetcher } from '../sources/types.js';
import { SETTING_KEYS, type BatchRunStats, type SettingsStore } from './settings-store.js';
import type { SnapshotStore } from './snapshot-store.js';

export interface BatchProgress {
  processed: number;
  catalogSize: number;
  updated: number;
  failed: number;
  skipped: number;
}

export interface BatchRunOptions {
  signal?: AbortSignal;
  onProgress?: (progress: BatchProgress) => void;
}

export interface BatchRunnerDeps {
  primary: SourceFetcher;
  selector: CandidateSelector;
  converter: CurrencyConversion;
  snapshots: SnapshotStore;
  settings: SettingsStore;
  /** Spaces primary-source requests; one in flight (see createBatchLimiter) */
  limiter: Bottleneck;
  sourceCurrency: string;
  targetCurrency: string;
  progressEvery?: number;
  logger?: Logger;
  clock?: Clock;
}

type ItemResult = 'updated' | 'failed' | 'skipped';

/**
 * Revalues every catalog item against the primary source and appends one
 * snapshot per priced item. Items are processed sequentially.
 */
export class BatchRevaluationRunner {
  private readonly log: Logger;
  private readonly clock: Clock;
  private readonly progressEvery: number;

  constructor(private readonly deps: BatchRunnerDeps) {
    this.log = deps.logger ?? pino({ name: 'price-tracker' });
    this.clock = deps.clock ?? systemClock;
    this.progressEvery = deps.progressEvery ?? 500;
  }

  async runBatchRevaluation(catalog: readonly ItemRecord[], options: BatchRunOptions = {}): Promise<BatchRunStats> {
    if (!this.deps.primary.configured) {
      throw new ConfigurationError('Primary price source is not configured; batch revaluation cannot start', [
        'PRICECHARTING_API_KEY',
      ]);
    }

    const startedAt = this.clock.now();
    const { sourceCurrency, targetCurrency } = this.deps;
    const quote = await this.deps.converter.getRate(sourceCurrency, targetCurrency);
    this.log.info(
      { catalogSize: catalog.length, rate: quote.rate, rateIsFallback: quote.isFallback },
      'Batch revaluation started',
    );

    const counts = { updated: 0, failed: 0, skipped: 0 };
    let processed = 0;
    let aborted = false;

    for (const item of catalog) {
      if (options.signal?.aborted) {
        aborted = true;
        this.log.warn({ processed, catalogSize: catalog.length }, 'Batch revaluation aborted');
        break;
      }

      let result: ItemResult;
      try {
        result = await this.revalueItem(item, quote.rate);
      } catch (err) {
        this.log.error({ itemId: item.id, err: toErrorObject(err) }, 'Item revaluation failed');
        result = 'failed';
      }
      counts[result]++;
      processed++;

      if (processed % this.progressEvery === 0) {
        const progress: BatchProgress = { processed, catalogSize: catalog.length, ...counts };
        this.log.info(progress, 'Batch progress');
        options.onProgress?.(progress);
      }
    }

    const finishedAt = this.clock.now();
    const stats: BatchRunStats = {
      ...counts,
      total: processed,
      durationSec: Math.round((finishedAt - startedAt) / 100) / 10,
      catalogSize: catalog.length,
      aborted,
      exchangeRate: quote.rate,
      rateIsFallback: quote.isFallback,
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
    };

    try {
      await this.deps.settings.setSetting(SETTING_KEYS.lastRun, JSON.stringify(stats));
    } catch (err) {
      this.log.error({ err: toErrorObject(err) }, 'Failed to persist batch statistics');
    }

    this.log.info(stats, 'Batch revaluation finished');
    return stats;
  }

  private async revalueItem(item: ItemRecord, rate: number): Promise<ItemResult> {
    const identity = identityFromItem(item);
    if (!identity) return 'skipped';

    const ctx = createPipelineContext('price-tracker', item.id);
    const { primary, selector, limiter, sourceCurrency, targetCurrency } = this.deps;

    const candidates = await limiter.schedule(() => primary.fetch(identity, ctx));
    const selection = await selector.select(identity, candidates, ctx);
    if (!selection) {
      this.log.debug({ ...ctx, title: item.title }, 'No price found');
      return 'failed';
    }

    const sourceAmount = roundForCurrency(selection.pick.price, sourceCurrency);
    try {
      await this.deps.snapshots.appendSnapshot({
        itemId: item.id,
        itemTitle: item.title,
        sourceAmount,
        targetAmount: roundForCurrency(sourceAmount * rate, targetCurrency),
        exchangeRate: rate,
        recordedAt: new Date(this.clock.now()),
      });
      return 'updated';
    } catch (err) {
      this.log.error({ ...ctx, err: toErrorObject(err) }, 'Failed to record snapshot');
      return 'failed';
    }
  }
}
