export type VariantFlag =
  | 'japanese'
  | 'first-edition'
  | 'holo'
  | 'reverse-holo'
  | 'shadowless';

/**
 * Normalized description of a card, used as the pricing search key.
 * Optional fields are undefined when absent, never empty strings.
 */
export interface CardIdentity {
  readonly name: string;
  readonly englishName?: string;
  readonly setName?: string;
  readonly cardNumber?: string;
  readonly rarity?: string;
  readonly variants: readonly VariantFlag[];
}

export type CandidateSource = 'catalog-api' | 'html-search' | 'mock-estimate';

/** One price + label pair returned by a source before filtering. */
export interface PriceCandidate {
  label: string;
  /** Source currency (USD) */
  price: number;
  source: CandidateSource;
  /** The source's own set/console label, e.g. "Pokemon Japanese Crimson Haze" */
  setLabel?: string;
  priceType?: 'loose' | 'complete' | 'new' | 'used' | 'ungraded' | 'estimate';
}

export type Confidence = 'high' | 'medium' | 'low';

export interface ResolvedValue {
  sourceAmount: number;
  sourceCurrency: string;
  targetAmount: number;
  targetCurrency: string;
  exchangeRate: number;
  rateIsFallback: boolean;
  /** Date the live rate applies to, or 'estimated' for the fallback constant */
  rateDate: string;
  confidence: Confidence;
  source: CandidateSource;
  matchedLabel: string;
  resolvedAt: string;
}

export type AppraisalOutcome =
  | { ok: true; value: ResolvedValue; cached: boolean }
  | { ok: false; reason: 'unable_to_estimate'; message: string };

export type CardLanguage = 'english' | 'japanese';

export const DEFAULT_LANGUAGE: CardLanguage = 'english';

export function targetLanguage(identity: CardIdentity): CardLanguage {
  return identity.variants.includes('japanese') ? 'japanese' : DEFAULT_LANGUAGE;
}

/**
 * Name used to query sources: the English name when known, otherwise the
 * parenthesised English part of "ピカチュウ (Pikachu)", otherwise the name
 * up to the first parenthesis.
 */
export function searchName(identity: CardIdentity): string {
  if (identity.englishName) return identity.englishName;
  const paren = identity.name.match(/\(([^)]+)\)/);
  if (paren?.[1]?.trim()) return paren[1].trim();
  return identity.name.split('(')[0].trim();
}

const PLACEHOLDER_SETS = new Set(['unknown', 'unknown set']);

export function hasUsableSet(identity: CardIdentity): identity is CardIdentity & { setName: string } {
  return identity.setName !== undefined && !PLACEHOLDER_SETS.has(identity.setName.trim().toLowerCase());
}

/** Free-text query sent to price sources, e.g. "Pikachu Base Set 58/102". */
export function buildSearchQuery(identity: CardIdentity): string {
  const parts = [searchName(identity)];
  if (hasUsableSet(identity)) parts.push(identity.setName);
  if (identity.cardNumber) parts.push(identity.cardNumber.replace(/#/g, '').trim());
  return parts.filter((p) => p.length > 0).join(' ');
}
