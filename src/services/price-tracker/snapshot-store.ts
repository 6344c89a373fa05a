import type pg from 'pg';
import { PersistenceError } from '../../utils/errors.js';

export interface PriceSnapshot {
  itemId: string;
  itemTitle: string;
  sourceAmount: number;
  targetAmount: number;
  exchangeRate: number;
  recordedAt: Date;
}

export interface SnapshotStore {
  appendSnapshot(snapshot: PriceSnapshot): Promise<void>;
  /** Newest first */
  getLatestSnapshots(itemId: string, limit: number): Promise<PriceSnapshot[]>;
  /** Up to `perItem` newest snapshots for each id, in one read. Ids without snapshots are absent. */
  getLatestSnapshotsForItems(itemIds: readonly string[], perItem: number): Promise<Map<string, PriceSnapshot[]>>;
}

interface SnapshotRow {
  item_id: string;
  item_title: string;
  source_amount: string;
  target_amount: string;
  exchange_rate: string;
  recorded_at: Date;
}

function toSnapshot(row: SnapshotRow): PriceSnapshot {
  return {
    itemId: row.item_id,
    itemTitle: row.item_title,
    sourceAmount: parseFloat(row.source_amount),
    targetAmount: parseFloat(row.target_amount),
    exchangeRate: parseFloat(row.exchange_rate),
    recordedAt: row.recorded_at,
  };
}

export class PgSnapshotStore implements SnapshotStore {
  constructor(private readonly pool: Pick<pg.Pool, 'query'>) {}

  async appendSnapshot(snapshot: PriceSnapshot): Promise<void> {
    try {
      await this.pool.query(
        `INSERT INTO price_snapshots (item_id, item_title, source_amount, target_amount, exchange_rate, recorded_at)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [
          snapshot.itemId,
          snapshot.itemTitle,
          snapshot.sourceAmount,
          snapshot.targetAmount,
          snapshot.exchangeRate,
          snapshot.recordedAt,
        ],
      );
    } catch (err) {
      throw new PersistenceError('snapshot insert', `item ${snapshot.itemId}`, err);
    }
  }

  async getLatestSnapshots(itemId: string, limit: number): Promise<PriceSnapshot[]> {
    try {
      const { rows } = await this.pool.query<SnapshotRow>(
        `SELECT item_id, item_title, source_amount, target_amount, exchange_rate, recorded_at
           FROM price_snapshots
          WHERE item_id = $1
          ORDER BY recorded_at DESC, id DESC
          LIMIT $2`,
        [itemId, limit],
      );
      return rows.map(toSnapshot);
    } catch (err) {
      throw new PersistenceError('snapshot read', `item ${itemId}`, err);
    }
  }

  async getLatestSnapshotsForItems(itemIds: readonly string[], perItem: number): Promise<Map<string, PriceSnapshot[]>> {
    const byItem = new Map<string, PriceSnapshot[]>();
    if (itemIds.length === 0) return byItem;

    let rows: SnapshotRow[];
    try {
      const result = await this.pool.query<SnapshotRow>(
        `SELECT item_id, item_title, source_amount, target_amount, exchange_rate, recorded_at
           FROM (
             SELECT *, ROW_NUMBER() OVER (PARTITION BY item_id ORDER BY recorded_at DESC, id DESC) AS rn
               FROM price_snapshots
              WHERE item_id = ANY($1)
           ) ranked
          WHERE rn <= $2
          ORDER BY item_id, rn`,
        [[...itemIds], perItem],
      );
      rows = result.rows;
    } catch (err) {
      throw new PersistenceError('snapshot read', `${itemIds.length} items`, err);
    }

    for (const row of rows) {
      const list = byItem.get(row.item_id) ?? [];
      list.push(toSnapshot(row));
      byItem.set(row.item_id, list);
    }
    return byItem;
  }
}
