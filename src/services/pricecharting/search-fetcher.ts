import axios from 'axios';
import * as cheerio from 'cheerio';
import pino from 'pino';
import { SourceUnavailableError, toErrorObject } from '../../utils/errors.js';
import { cardNumberVariants } from '../appraisal/card-number.js';
import { buildSearchQuery, type CardIdentity, type PriceCandidate } from '../appraisal/types.js';
import type { Logger, PipelineContext } from '../logger/correlation.js';
import type { SourceFetcher } from '../sources/types.js';
import type { HttpClient } from './api-fetcher.js';

const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36';
const MAX_SUGGESTIONS = 10;
const LOCALE_PATHS = ['/de/', '/fr/', '/es/', '/it/'];

export interface SearchResultRow {
  title: string;
  console?: string;
  price: number;
}

export interface SuggestionLink {
  href: string;
  text: string;
}

/** "$1,234.56" → 1234.56; null for blanks, dashes and zero. */
export function parsePrice(text: string): number | null {
  const match = text.replace(/,/g, '').match(/(\d+(?:\.\d+)?)/);
  if (!match) return null;
  const value = parseFloat(match[1]);
  return Number.isFinite(value) && value > 0 ? value : null;
}

/** Rows of the search results table that carry both a title and a used price. */
export function parseSearchResults(html: string): SearchResultRow[] {
  const $ = cheerio.load(html);
  const rows: SearchResultRow[] = [];

  $('tr').each((_, el) => {
    const $row = $(el);
    const title = $row.find('td.title').text().replace(/\s+/g, ' ').trim();
    const price = parsePrice($row.find('td.used_price').text());
    if (!title || price === null) return;

    const consoleName = $row.find('td.console').text().trim();
    rows.push({ title, price, ...(consoleName ? { console: consoleName } : {}) });
  });

  return rows;
}

/**
 * Product links on a page with no results table, keeping only those whose
 * path mentions one of the card-number variants. Localized duplicates are
 * dropped.
 */
export function parseSuggestionLinks(html: string, variants: readonly string[]): SuggestionLink[] {
  const $ = cheerio.load(html);
  const needles = variants.map((v) => v.toLowerCase().replace(/[-/]/g, '')).filter((v) => v.length > 0);
  const seen = new Set<string>();
  const links: SuggestionLink[] = [];

  $('a[href]').each((_, el) => {
    const href = $(el).attr('href') ?? '';
    if (!href.includes('/game/') || LOCALE_PATHS.some((p) => href.includes(p))) return;
    if (seen.has(href)) return;

    const compactHref = href.toLowerCase().replace(/[-/]/g, '');
    if (!needles.some((n) => compactHref.includes(n))) return;

    seen.add(href);
    links.push({ href, text: $(el).text().replace(/\s+/g, ' ').trim() });
  });

  return links.slice(0, MAX_SUGGESTIONS);
}

/** Ungraded price from a product detail page: the "Ungraded" row, else #used-price. */
export function parseDetailPrice(html: string): number | null {
  const $ = cheerio.load(html);

  const ungradedCell = $('td')
    .filter((_, el) => /^\s*ungraded\s*$/i.test($(el).text()))
    .first();
  if (ungradedCell.length > 0) {
    const price = parsePrice(ungradedCell.next('td').text());
    if (price !== null) return price;
  }

  return parsePrice($('#used-price').text());
}

export interface PriceChartingSearchOptions {
  baseUrl?: string;
  timeoutMs?: number;
  http?: HttpClient;
  logger?: Logger;
}

/**
 * Fallback tier: the public search page. Only used with a card number,
 * since name-only page results are too noisy to price from.
 */
export class PriceChartingSearchFetcher implements SourceFetcher {
  readonly name = 'html-search';
  readonly configured = true;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly http: HttpClient;
  private readonly log: Logger;

  constructor(options: PriceChartingSearchOptions = {}) {
    this.baseUrl = options.baseUrl ?? 'https://www.pricecharting.com';
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.http = options.http ?? axios.create({ timeout: this.timeoutMs });
    this.log = options.logger ?? pino({ name: 'pricecharting-search' });
  }

  async fetch(identity: CardIdentity, ctx: PipelineContext): Promise<PriceCandidate[]> {
    const variants = cardNumberVariants(identity.cardNumber);
    if (variants.length === 0) {
      this.log.debug({ ...ctx }, 'No card number, skipping HTML search');
      return [];
    }

    const query = buildSearchQuery(identity);
    try {
      const html = await this.getPage(`${this.baseUrl}/search-products`, { q: query, type: 'prices' });
      const rows = parseSearchResults(html);

      if (rows.length > 0) {
        this.log.debug({ ...ctx, query, rows: rows.length }, 'HTML search results parsed');
        return rows.map((row): PriceCandidate => ({
          label: row.title,
          price: row.price,
          source: 'html-search',
          priceType: 'used',
          ...(row.console ? { setLabel: row.console } : {}),
        }));
      }

      return await this.followSuggestions(html, variants, ctx);
    } catch (err) {
      this.log.warn({ ...ctx, query, err: toErrorObject(err) }, 'HTML search unavailable');
      return [];
    }
  }

  private async followSuggestions(
    html: string,
    variants: readonly string[],
    ctx: PipelineContext,
  ): Promise<PriceCandidate[]> {
    const links = parseSuggestionLinks(html, variants);
    this.log.debug({ ...ctx, links: links.length }, 'No result rows, following suggestions');

    for (const link of links) {
      const url = link.href.startsWith('http') ? link.href : `${this.baseUrl}${link.href}`;
      try {
        const price = parseDetailPrice(await this.getPage(url));
        if (price !== null) {
          return [{ label: link.text || link.href, price, source: 'html-search', priceType: 'ungraded' }];
        }
      } catch (err) {
        this.log.debug({ ...ctx, url, err: toErrorObject(err) }, 'Suggestion page failed');
      }
    }
    return [];
  }

  private async getPage(url: string, params?: Record<string, string>): Promise<string> {
    const response = await this.http
      .get<string>(url, {
        params,
        timeout: this.timeoutMs,
        responseType: 'text',
        headers: { 'User-Agent': USER_AGENT, Accept: 'text/html' },
        validateStatus: () => true,
      })
      .catch((err: unknown) => {
        throw new SourceUnavailableError('PriceCharting search', 'request failed', err);
      });

    if (response.status !== 200) {
      throw new SourceUnavailableError('PriceCharting search', `returned ${response.status}`);
    }
    if (typeof response.data !== 'string') {
      throw new SourceUnavailableError('PriceCharting search', 'response was not HTML');
    }
    return response.data;
  }
}
