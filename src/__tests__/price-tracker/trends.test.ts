import { describe, it, expect } from 'vitest';
import type { ItemRecord } from '../../services/catalog/catalog-provider.js';
import type { PriceSnapshot } from '../../services/price-tracker/snapshot-store.js';
import { computeTrend, getGainers, getGainersWithFallback } from '../../services/price-tracker/trends.js';
import { InMemorySnapshotStore } from '../helpers/fakes.js';

const DAY = 86_400_000;
const T0 = Date.UTC(2026, 9, 1, 3);

function snap(itemId: string, sourceAmount: number, day: number): PriceSnapshot {
  return {
    itemId,
    itemTitle: `Card ${itemId}`,
    sourceAmount,
    targetAmount: sourceAmount * 150,
    exchangeRate: 150,
    recordedAt: new Date(T0 + day * DAY),
  };
}

async function storeWith(snapshots: PriceSnapshot[]): Promise<InMemorySnapshotStore> {
  const store = new InMemorySnapshotStore();
  for (const s of snapshots) await store.appendSnapshot(s);
  return store;
}

const catalog: ItemRecord[] = ['a', 'b', 'c', 'd'].map((id) => ({ id, title: `Card ${id}` }));

describe('computeTrend', () => {
  it('compares the two newest snapshots whatever their order', () => {
    const trend = computeTrend([snap('a', 100, 0), snap('a', 120, 7)]);

    expect(trend).toMatchObject({ latestAmount: 120, previousAmount: 100, pctChange: 20, latestTargetAmount: 18000 });
  });

  it('needs two snapshots and a non-zero previous price', () => {
    expect(computeTrend([snap('a', 100, 0)])).toBeNull();
    expect(computeTrend([snap('a', 0, 0), snap('a', 50, 7)])).toBeNull();
  });
});

describe('getGainers', () => {
  it('ranks items by percent change and applies the limit', async () => {
    const store = await storeWith([
      snap('a', 100, 0),
      snap('a', 120, 7),
      snap('b', 50, 0),
      snap('b', 40, 7),
      snap('c', 10, 0),
      snap('c', 15, 7),
      snap('d', 999, 7),
    ]);

    const gainers = await getGainers(store, catalog, 2);

    expect(gainers.map((g) => [g.itemId, g.pctChange])).toEqual([
      ['c', 50],
      ['a', 20],
    ]);
  });

  it('ignores snapshots older than the two newest', async () => {
    const store = await storeWith([snap('a', 1, 0), snap('a', 100, 7), snap('a', 110, 14)]);

    const [gainer] = await getGainers(store, catalog, 10);

    expect(gainer?.previousAmount).toBe(100);
    expect(gainer?.pctChange).toBeCloseTo(10);
  });

  it('reads every item history in a single store call', async () => {
    const store = await storeWith([snap('a', 100, 0), snap('a', 120, 7), snap('b', 10, 0), snap('b', 15, 7)]);

    await getGainers(store, catalog, 10);

    expect(store.batchReads).toBe(1);
  });
});

describe('getGainersWithFallback', () => {
  it('returns the trend ranking when enough items have a trend', async () => {
    const store = await storeWith([snap('a', 100, 0), snap('a', 120, 7), snap('b', 10, 0), snap('b', 15, 7)]);

    const result = await getGainersWithFallback(store, catalog, 2);

    expect(result.ranking).toBe('trend');
    expect(result.items.map((i) => i.itemId)).toEqual(['b', 'a']);
  });

  it('ranks by latest target price when too few items have a trend', async () => {
    const store = await storeWith([snap('a', 100, 0), snap('a', 120, 7), snap('b', 300, 7), snap('c', 40, 7)]);

    const result = await getGainersWithFallback(store, catalog, 5);

    expect(result).toEqual({
      ranking: 'price',
      items: [
        { itemId: 'b', itemTitle: 'Card b', latestAmount: 300, latestTargetAmount: 45000, recordedAt: new Date(T0 + 7 * DAY) },
        { itemId: 'a', itemTitle: 'Card a', latestAmount: 120, latestTargetAmount: 18000, recordedAt: new Date(T0 + 7 * DAY) },
        { itemId: 'c', itemTitle: 'Card c', latestAmount: 40, latestTargetAmount: 6000, recordedAt: new Date(T0 + 7 * DAY) },
      ],
    });
  });
});
