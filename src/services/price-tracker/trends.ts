import type { ItemRecord } from '../catalog/catalog-provider.js';
import type { PriceSnapshot, SnapshotStore } from './snapshot-store.js';

export interface RankedItem {
  itemId: string;
  itemTitle: string;
  latestAmount: number;
  previousAmount: number;
  /** Percent change between the two most recent snapshots, source currency */
  pctChange: number;
  latestTargetAmount: number;
  recordedAt: Date;
}

export interface PriceRankedItem {
  itemId: string;
  itemTitle: string;
  latestAmount: number;
  latestTargetAmount: number;
  recordedAt: Date;
}

export type GainerRanking =
  | { ranking: 'trend'; items: RankedItem[] }
  | { ranking: 'price'; items: PriceRankedItem[] };

type SnapshotReader = Pick<SnapshotStore, 'getLatestSnapshotsForItems'>;

/** Trend from the two newest snapshots; null without two or with a zero previous price. */
export function computeTrend(snapshots: readonly PriceSnapshot[]): RankedItem | null {
  const [latest, previous] = [...snapshots].sort((a, b) => b.recordedAt.getTime() - a.recordedAt.getTime());
  if (!latest || !previous || previous.sourceAmount === 0) return null;

  return {
    itemId: latest.itemId,
    itemTitle: latest.itemTitle,
    latestAmount: latest.sourceAmount,
    previousAmount: previous.sourceAmount,
    pctChange: ((latest.sourceAmount - previous.sourceAmount) / previous.sourceAmount) * 100,
    latestTargetAmount: latest.targetAmount,
    recordedAt: latest.recordedAt,
  };
}

async function loadHistories(store: SnapshotReader, catalog: readonly ItemRecord[]): Promise<PriceSnapshot[][]> {
  const byItem = await store.getLatestSnapshotsForItems(
    catalog.map((item) => item.id),
    2,
  );
  return catalog.map((item) => byItem.get(item.id) ?? []);
}

function rankTrends(histories: readonly PriceSnapshot[][]): RankedItem[] {
  return histories
    .map(computeTrend)
    .filter((t): t is RankedItem => t !== null)
    .sort((a, b) => b.pctChange - a.pctChange);
}

export async function getGainers(
  store: SnapshotReader,
  catalog: readonly ItemRecord[],
  limit: number,
): Promise<RankedItem[]> {
  return rankTrends(await loadHistories(store, catalog)).slice(0, limit);
}

/**
 * Trend ranking when at least `limit` items have a trend, otherwise items
 * ranked by latest target-currency price. The two are never mixed.
 */
export async function getGainersWithFallback(
  store: SnapshotReader,
  catalog: readonly ItemRecord[],
  limit: number,
): Promise<GainerRanking> {
  const histories = await loadHistories(store, catalog);
  const trends = rankTrends(histories);
  if (trends.length >= limit) {
    return { ranking: 'trend', items: trends.slice(0, limit) };
  }

  const byPrice = histories
    .map((snapshots): PriceRankedItem | null => {
      const latest = [...snapshots].sort((a, b) => b.recordedAt.getTime() - a.recordedAt.getTime())[0];
      if (!latest) return null;
      return {
        itemId: latest.itemId,
        itemTitle: latest.itemTitle,
        latestAmount: latest.sourceAmount,
        latestTargetAmount: latest.targetAmount,
        recordedAt: latest.recordedAt,
      };
    })
    .filter((p): p is PriceRankedItem => p !== null)
    .sort((a, b) => b.latestTargetAmount - a.latestTargetAmount);

  return { ranking: 'price', items: byPrice.slice(0, limit) };
}
