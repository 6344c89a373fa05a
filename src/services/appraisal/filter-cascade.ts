import { cardNumberVariants, matchesCardNumber } from './card-number.js';
import { skipped, success, type Stage } from './pipeline.js';
import {
  hasUsableSet,
  searchName,
  targetLanguage,
  type CardIdentity,
  type CardLanguage,
  type PriceCandidate,
} from './types.js';

/** Lowercase, fold punctuation to single spaces, pad so containment is word-aligned. */
export function normalizeText(value: string): string {
  const folded = value
    .normalize('NFKC')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
  return folded ? ` ${folded} ` : '';
}

function contains(haystack: string, needle: string): boolean {
  return needle.length > 0 && normalizeText(haystack).includes(needle);
}

const LANGUAGES: readonly CardLanguage[] = ['english', 'japanese'];

/** Languages a candidate is explicitly labeled with, in its label or set label. */
export function labeledLanguages(candidate: PriceCandidate): Set<CardLanguage> {
  const text = normalizeText(`${candidate.label} ${candidate.setLabel ?? ''}`);
  return new Set(LANGUAGES.filter((language) => text.includes(` ${language} `)));
}

export function nameStage(identity: CardIdentity): Stage<PriceCandidate[], PriceCandidate[]> {
  return {
    name: 'name',
    async run(candidates) {
      const needle = normalizeText(searchName(identity));
      if (!needle) return skipped('identity has no usable name');
      return success(candidates.filter((c) => contains(c.label, needle)));
    },
  };
}

export function setStage(identity: CardIdentity): Stage<PriceCandidate[], PriceCandidate[]> {
  return {
    name: 'set',
    async run(candidates) {
      if (!hasUsableSet(identity)) return skipped('no usable set name');
      const needle = normalizeText(identity.setName);
      return success(
        candidates.filter((c) => contains(c.label, needle) || contains(c.setLabel ?? '', needle)),
      );
    },
  };
}

export function cardNumberStage(identity: CardIdentity): Stage<PriceCandidate[], PriceCandidate[]> {
  return {
    name: 'card-number',
    async run(candidates) {
      const variants = cardNumberVariants(identity.cardNumber);
      if (variants.length === 0) return skipped('no card number');
      return success(candidates.filter((c) => matchesCardNumber(c.label, variants)));
    },
  };
}

/**
 * Prefer candidates explicitly labeled with the target language. When none
 * are, a non-default target keeps only unlabeled candidates, and the default
 * target drops those labeled with another language.
 */
export function languageStage(identity: CardIdentity): Stage<PriceCandidate[], PriceCandidate[]> {
  return {
    name: 'language',
    async run(candidates) {
      const target = targetLanguage(identity);
      const explicit = candidates.filter((c) => labeledLanguages(c).has(target));
      if (explicit.length > 0) return success(explicit);

      if (target === 'japanese') {
        return success(candidates.filter((c) => labeledLanguages(c).size === 0));
      }
      return success(
        candidates.filter((c) => ![...labeledLanguages(c)].some((language) => language !== target)),
      );
    },
  };
}

export function buildFilterCascade(
  identity: CardIdentity,
): Array<Stage<PriceCandidate[], PriceCandidate[]>> {
  return [nameStage(identity), setStage(identity), cardNumberStage(identity), languageStage(identity)];
}
