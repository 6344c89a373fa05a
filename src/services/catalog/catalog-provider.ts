import type pg from 'pg';
import { PersistenceError } from '../../utils/errors.js';
import type { CardIdentity } from '../appraisal/types.js';

/** One catalog entry as the price tracker sees it. */
export interface ItemRecord {
  id: string;
  title: string;
  setName?: string;
  cardNumber?: string;
}

export interface CatalogProvider {
  listItems(): Promise<ItemRecord[]>;
}

function present(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Identity for a catalog item, or null when the item has no usable title
 * (blank, or an unpublished "Draft").
 */
export function identityFromItem(item: ItemRecord): CardIdentity | null {
  const title = item.title.trim();
  if (!title || title.toLowerCase() === 'draft') return null;

  const setName = present(item.setName);
  const cardNumber = present(item.cardNumber);
  return {
    name: title,
    ...(setName ? { setName } : {}),
    ...(cardNumber ? { cardNumber } : {}),
    variants: [],
  };
}

interface CatalogRow {
  id: string;
  title: string | null;
  set_name: string | null;
  card_number: string | null;
}

export class PgCatalogProvider implements CatalogProvider {
  constructor(private readonly pool: Pick<pg.Pool, 'query'>) {}

  async listItems(): Promise<ItemRecord[]> {
    try {
      const { rows } = await this.pool.query<CatalogRow>(
        `SELECT id::text AS id, title, set_name, card_number
           FROM catalog_items
          ORDER BY id`,
      );
      return rows.map((row) => {
        const setName = present(row.set_name);
        const cardNumber = present(row.card_number);
        return {
          id: row.id,
          title: row.title ?? '',
          ...(setName ? { setName } : {}),
          ...(cardNumber ? { cardNumber } : {}),
        };
      });
    } catch (err) {
      throw new PersistenceError('catalog read', 'could not list catalog items', err);
    }
  }
}
