import axios, { type AxiosInstance } from 'axios';
import pino from 'pino';
import { z } from 'zod';
import { SourceUnavailableError, toErrorObject } from '../../utils/errors.js';
import { buildSearchQuery, type CardIdentity, type PriceCandidate } from '../appraisal/types.js';
import type { Logger, PipelineContext } from '../logger/correlation.js';
import type { SourceFetcher } from '../sources/types.js';

// --- API response types ---

const centsField = z.union([z.number(), z.string()]).nullish();

const productSchema = z.object({
  'product-name': z.string().optional(),
  'console-name': z.string().optional(),
  'loose-price': centsField,
  'cib-price': centsField,
  'new-price': centsField,
});

const productsResponseSchema = z.object({
  status: z.string().optional(),
  products: z.array(productSchema).default([]),
});

export type PriceChartingProduct = z.infer<typeof productSchema>;

export type HttpClient = Pick<AxiosInstance, 'get'>;

export interface PriceChartingApiOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  http?: HttpClient;
  logger?: Logger;
}

const PRICE_FIELDS = [
  ['loose-price', 'loose'],
  ['cib-price', 'complete'],
  ['new-price', 'new'],
] as const;

/** First positive of loose → complete-in-box → new, converted from cents. */
export function productToCandidate(product: PriceChartingProduct): PriceCandidate | null {
  const label = product['product-name']?.trim();
  if (!label) return null;

  for (const [field, priceType] of PRICE_FIELDS) {
    const cents = Number(product[field] ?? 0);
    if (Number.isFinite(cents) && cents > 0) {
      return {
        label,
        price: cents / 100,
        source: 'catalog-api',
        priceType,
        ...(product['console-name'] ? { setLabel: product['console-name'] } : {}),
      };
    }
  }
  return null;
}

/**
 * Primary tier: the PriceCharting products search API, keyed by token.
 */
export class PriceChartingApiFetcher implements SourceFetcher {
  readonly name = 'catalog-api';
  private readonly apiKey: string | undefined;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly http: HttpClient;
  private readonly log: Logger;

  constructor(options: PriceChartingApiOptions = {}) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? 'https://www.pricecharting.com';
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.http = options.http ?? axios.create({ timeout: this.timeoutMs });
    this.log = options.logger ?? pino({ name: 'pricecharting-api' });
  }

  get configured(): boolean {
    return Boolean(this.apiKey);
  }

  async fetch(identity: CardIdentity, ctx: PipelineContext): Promise<PriceCandidate[]> {
    if (!this.apiKey) return [];
    const query = buildSearchQuery(identity);

    try {
      const products = await this.searchProducts(this.apiKey, query);
      const candidates = products
        .map(productToCandidate)
        .filter((c): c is PriceCandidate => c !== null);

      this.log.debug(
        { ...ctx, query, products: products.length, candidates: candidates.length },
        'Catalog API search complete',
      );
      return candidates;
    } catch (err) {
      this.log.warn({ ...ctx, query, err: toErrorObject(err) }, 'Catalog API unavailable');
      return [];
    }
  }

  private async searchProducts(apiKey: string, query: string): Promise<PriceChartingProduct[]> {
    const response = await this.http
      .get<unknown>(`${this.baseUrl}/api/products`, {
        params: { t: apiKey, q: query },
        timeout: this.timeoutMs,
        validateStatus: () => true,
      })
      .catch((err: unknown) => {
        throw new SourceUnavailableError('PriceCharting', 'request failed', err);
      });

    if (response.status !== 200) {
      throw new SourceUnavailableError('PriceCharting', `returned ${response.status}`);
    }

    const parsed = productsResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new SourceUnavailableError('PriceCharting', 'unexpected response shape', parsed.error);
    }
    if (parsed.data.status && parsed.data.status !== 'success') {
      throw new SourceUnavailableError('PriceCharting', `status ${parsed.data.status}`);
    }
    return parsed.data.products;
  }
}
