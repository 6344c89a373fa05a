import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { CandidateSelector } from '../../services/appraisal/candidate-selector.js';
import { Disambiguator } from '../../services/appraisal/disambiguator.js';
import type { ItemRecord } from '../../services/catalog/catalog-provider.js';
import type { CurrencyConversion } from '../../services/exchange-rate/exchange-rate-service.js';
import { BatchRevaluationRunner, type BatchProgress } from '../../services/price-tracker/batch-runner.js';
import { SETTING_KEYS } from '../../services/price-tracker/settings-store.js';
import { createBatchLimiter } from '../../services/rate-limit/limiters.js';
import { systemClock } from '../../utils/clock.js';
import { ConfigurationError } from '../../utils/errors.js';
import {
  InMemorySettingsStore,
  InMemorySnapshotStore,
  StubFetcher,
  candidate,
  silentLogger,
} from '../helpers/fakes.js';

const NOW = Date.UTC(2026, 9, 19, 3);

const catalog: ItemRecord[] = [
  { id: '1', title: 'Pikachu', cardNumber: '58/102' },
  { id: '2', title: 'Draft' },
  { id: '3', title: '   ' },
  { id: '4', title: 'Mew' },
  { id: '5', title: 'Eevee' },
];

// Bottleneck spaces requests with timers and Date.now, both faked here.
beforeEach(() => {
  vi.useFakeTimers();
  vi.setSystemTime(NOW);
});

afterEach(() => {
  vi.useRealTimers();
});

async function withTimers<T>(run: Promise<T>): Promise<T> {
  const [result] = await Promise.all([run, vi.runAllTimersAsync()]);
  return result;
}

function setup(options: { configured?: boolean; isFallback?: boolean } = {}) {
  const primary = new StubFetcher(
    'catalog-api',
    (identity) => (identity.name === 'Mew' ? [] : [candidate(`${identity.name} #58`, 10)]),
    options.configured ?? true,
    systemClock,
  );
  const getRate = vi.fn(async () => ({ rate: 150, isFallback: options.isFallback ?? false, rateDate: '2026-10-16' }));
  const converter: CurrencyConversion = {
    getRate,
    convert: async (amount: number) => ({ amount: amount * 150, rate: 150, isFallback: false, rateDate: '2026-10-16' }),
  };
  const snapshots = new InMemorySnapshotStore();
  const settings = new InMemorySettingsStore();
  const runner = new BatchRevaluationRunner({
    primary,
    selector: new CandidateSelector(new Disambiguator(null, { logger: silentLogger }), silentLogger),
    converter,
    snapshots,
    settings,
    limiter: createBatchLimiter(1_100),
    sourceCurrency: 'USD',
    targetCurrency: 'JPY',
    progressEvery: 2,
    logger: silentLogger,
  });
  return { runner, primary, snapshots, settings, getRate };
}

describe('BatchRevaluationRunner', () => {
  it('counts updated, failed and skipped items', async () => {
    const { runner } = setup();

    const stats = await withTimers(runner.runBatchRevaluation(catalog));

    expect(stats).toMatchObject({
      updated: 2,
      failed: 1,
      skipped: 2,
      total: 5,
      catalogSize: 5,
      aborted: false,
      exchangeRate: 150,
      rateIsFallback: false,
    });
    expect(stats.updated + stats.failed + stats.skipped).toBe(stats.total);
  });

  it('spaces primary requests by at least the minimum interval', async () => {
    const { runner, primary } = setup();

    const stats = await withTimers(runner.runBatchRevaluation(catalog));

    expect(primary.callTimes).toEqual([NOW, NOW + 1_100, NOW + 2_200]);
    expect(stats.durationSec).toBe(2.2);
  });

  it('appends one snapshot per priced item at the run rate', async () => {
    const { runner, snapshots } = setup();

    await withTimers(runner.runBatchRevaluation(catalog));

    expect(snapshots.snapshots).toEqual([
      {
        itemId: '1',
        itemTitle: 'Pikachu',
        sourceAmount: 10,
        targetAmount: 1500,
        exchangeRate: 150,
        recordedAt: new Date(NOW),
      },
      {
        itemId: '5',
        itemTitle: 'Eevee',
        sourceAmount: 10,
        targetAmount: 1500,
        exchangeRate: 150,
        recordedAt: new Date(NOW + 2_200),
      },
    ]);
  });

  it('fetches the exchange rate once per run', async () => {
    const { runner, getRate } = setup({ isFallback: true });

    const stats = await withTimers(runner.runBatchRevaluation(catalog));

    expect(getRate).toHaveBeenCalledTimes(1);
    expect(stats.rateIsFallback).toBe(true);
  });

  it('counts a failed snapshot write as failed and keeps going', async () => {
    const { runner, snapshots } = setup();
    snapshots.failingItems.add('1');

    const stats = await withTimers(runner.runBatchRevaluation(catalog));

    expect(stats).toMatchObject({ updated: 1, failed: 2, skipped: 2, total: 5 });
    expect(snapshots.snapshots.map((s) => s.itemId)).toEqual(['5']);
  });

  it('reports progress at the configured interval', async () => {
    const { runner } = setup();
    const progress: BatchProgress[] = [];

    await withTimers(runner.runBatchRevaluation(catalog, { onProgress: (p) => progress.push(p) }));

    expect(progress).toEqual([
      { processed: 2, catalogSize: 5, updated: 1, failed: 0, skipped: 1 },
      { processed: 4, catalogSize: 5, updated: 1, failed: 1, skipped: 2 },
    ]);
  });

  it('stops at the next item once aborted and returns partial statistics', async () => {
    const { runner, primary } = setup();
    const controller = new AbortController();

    const stats = await withTimers(
      runner.runBatchRevaluation(catalog, {
        signal: controller.signal,
        onProgress: () => controller.abort(),
      }),
    );

    expect(stats).toMatchObject({ total: 2, catalogSize: 5, aborted: true });
    expect(stats.updated + stats.failed + stats.skipped).toBe(2);
    expect(primary.calls).toBe(1);
  });

  it('persists the run statistics', async () => {
    const { runner, settings } = setup();

    const stats = await withTimers(runner.runBatchRevaluation(catalog));

    expect(JSON.parse(settings.values.get(SETTING_KEYS.lastRun) ?? 'null')).toEqual(stats);
  });

  it('still returns statistics when they cannot be persisted', async () => {
    const { runner, settings } = setup();
    settings.failWrites = true;

    await expect(withTimers(runner.runBatchRevaluation(catalog))).resolves.toMatchObject({ total: 5 });
  });

  it('refuses to start without a configured primary source', async () => {
    const { runner, getRate, primary } = setup({ configured: false });

    await expect(runner.runBatchRevaluation(catalog)).rejects.toBeInstanceOf(ConfigurationError);
    expect(getRate).not.toHaveBeenCalled();
    expect(primary.calls).toBe(0);
  });
});
