import { z } from 'zod';
import { OracleFailureError } from '../../utils/errors.js';
import type { DisambiguationRequest } from '../appraisal/disambiguator.js';

const SPECIAL_EDITIONS = ['[Promo]', '[Alt Art]', '[Parallel]', '[Serial]', '[Ichiban Kuji]'];

export function buildDisambiguationPrompt(request: DisambiguationRequest): string {
  const languageLabel = request.language === 'japanese' ? 'Japanese' : 'English';
  const list = request.candidates
    .map((c, i) => `${i + 1}. ${c.label}${c.setLabel ? ` (${c.setLabel})` : ''}`)
    .join('\n');

  return [
    'You match trading card price listings to a search query.',
    `Query: ${request.query}`,
    request.cardNumber ? `Card number: ${request.cardNumber}` : 'Card number: unknown',
    '',
    'Candidates:',
    list,
    '',
    'Pick the candidates that are the same card as the query. Priority, highest first:',
    '1. The card number matches.',
    `2. Regular editions over special ones (${SPECIAL_EDITIONS.join(', ')}).`,
    `3. ${languageLabel} versions.`,
    '4. The base card name matches.',
    '',
    'Reply with only a JSON array of the matching candidate numbers, e.g. [2, 5].',
  ].join('\n');
}

const verdictSchema = z.array(z.number().int());

/** Strip a markdown code fence and surrounding prose, keeping the JSON array. */
export function extractJsonArray(text: string): string {
  const cleaned = text
    .replace(/```json\n?/g, '')
    .replace(/```\n?/g, '')
    .trim();
  const arrayMatch = cleaned.match(/\[[\s\S]*?\]/);
  return arrayMatch ? arrayMatch[0] : cleaned;
}

export function parseVerdict(text: string): number[] {
  let raw: unknown;
  try {
    raw = JSON.parse(extractJsonArray(text));
  } catch (err) {
    throw new OracleFailureError('verdict is not JSON', err);
  }

  const parsed = verdictSchema.safeParse(raw);
  if (!parsed.success) {
    throw new OracleFailureError('verdict is not an array of integers', parsed.error);
  }
  return parsed.data;
}
