import type { SourceFetcher } from '../sources/types.js';
import type { CardIdentity, PriceCandidate, VariantFlag } from './types.js';

// Deterministic rough value for when every real source is down.
// Amounts are in the source currency.

const RARITY_BASE: Record<string, number> = {
  'common': 0.5,
  'uncommon': 1.5,
  'rare': 5,
  'epic': 15,
  'ultra rare': 50,
  'holo rare': 20,
  'secret rare': 100,
};
const DEFAULT_BASE = 1;

const HOLO_MULTIPLIER = 1.8;

// Reverse holo is a holo finish, so it earns the holo multiplier as well.
const VARIANT_MULTIPLIERS: Record<VariantFlag, number> = {
  'japanese': 1,
  'first-edition': 2.5,
  'holo': HOLO_MULTIPLIER,
  'reverse-holo': HOLO_MULTIPLIER * 1.3,
  'shadowless': 3.0,
};

const POPULAR_SETS = ['base set', 'jungle', 'fossil', 'team rocket', 'neo genesis'];
const POPULAR_SET_MULTIPLIER = 1.5;

const POPULAR_NAMES = ['charizard', 'pikachu', 'mewtwo', 'lugia', 'rayquaza'];
const POPULAR_NAME_MULTIPLIER = 3;

export function estimateValue(identity: CardIdentity): number {
  let value = RARITY_BASE[identity.rarity?.trim().toLowerCase() ?? ''] ?? DEFAULT_BASE;

  for (const flag of identity.variants) {
    value *= VARIANT_MULTIPLIERS[flag];
  }

  const set = identity.setName?.toLowerCase() ?? '';
  if (POPULAR_SETS.some((s) => set.includes(s))) value *= POPULAR_SET_MULTIPLIER;

  const name = `${identity.name} ${identity.englishName ?? ''}`.toLowerCase();
  if (POPULAR_NAMES.some((n) => name.includes(n))) value *= POPULAR_NAME_MULTIPLIER;

  return Math.round(value * 100) / 100;
}

export class MockEstimator implements SourceFetcher {
  readonly name = 'mock-estimate';
  readonly configured = true;

  async fetch(identity: CardIdentity): Promise<PriceCandidate[]> {
    const price = estimateValue(identity);
    if (price <= 0) return [];
    return [{ label: `${identity.name} (estimate)`, price, source: 'mock-estimate', priceType: 'estimate' }];
  }
}
