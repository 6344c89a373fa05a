import axios from 'axios';
import pino from 'pino';
import { z } from 'zod';
import { CurrencyUnavailableError, toErrorObject } from '../../utils/errors.js';
import type { Logger } from '../logger/correlation.js';
import type { HttpClient } from '../pricecharting/api-fetcher.js';

export interface RateQuote {
  rate: number;
  isFallback: boolean;
  /** Date the live rate applies to, or 'estimated' for the fallback */
  rateDate: string;
}

export interface Conversion extends RateQuote {
  amount: number;
}

export interface CurrencyConversion {
  getRate(from: string, to: string): Promise<RateQuote>;
  convert(amount: number, from: string, to: string): Promise<Conversion>;
}

const latestResponseSchema = z.object({
  base: z.string(),
  date: z.string(),
  rates: z.record(z.number().positive()),
});

export interface CurrencyConverterOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Used for the configured source→target pair when the live rate is unavailable */
  fallbackRate: number;
  http?: HttpClient;
  logger?: Logger;
}

/**
 * Live rates from a Frankfurter-compatible endpoint. Never throws: any
 * failure yields the fallback constant, flagged.
 */
export class CurrencyConverter implements CurrencyConversion {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fallbackRate: number;
  private readonly http: HttpClient;
  private readonly log: Logger;

  constructor(options: CurrencyConverterOptions) {
    this.baseUrl = options.baseUrl ?? 'https://api.frankfurter.app';
    this.timeoutMs = options.timeoutMs ?? 5_000;
    this.fallbackRate = options.fallbackRate;
    this.http = options.http ?? axios.create({ timeout: this.timeoutMs });
    this.log = options.logger ?? pino({ name: 'exchange-rate' });
  }

  async getRate(from: string, to: string): Promise<RateQuote> {
    if (from === to) {
      return { rate: 1, isFallback: false, rateDate: new Date().toISOString().slice(0, 10) };
    }

    try {
      const quote = await this.fetchRate(from, to);
      this.log.debug({ from, to, rate: quote.rate, date: quote.rateDate }, 'Fetched exchange rate');
      return quote;
    } catch (err) {
      this.log.warn(
        { from, to, fallbackRate: this.fallbackRate, err: toErrorObject(err) },
        'Exchange rate unavailable, using fallback',
      );
      return { rate: this.fallbackRate, isFallback: true, rateDate: 'estimated' };
    }
  }

  async convert(amount: number, from: string, to: string): Promise<Conversion> {
    const quote = await this.getRate(from, to);
    return { ...quote, amount: amount * quote.rate };
  }

  private async fetchRate(from: string, to: string): Promise<RateQuote> {
    const response = await this.http
      .get<unknown>(`${this.baseUrl}/latest`, {
        params: { from, to },
        timeout: this.timeoutMs,
      })
      .catch((err: unknown) => {
        throw new CurrencyUnavailableError('request failed', err);
      });

    const parsed = latestResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new CurrencyUnavailableError('unexpected response shape', parsed.error);
    }

    const rate = parsed.data.rates[to];
    if (rate === undefined) {
      throw new CurrencyUnavailableError(`no ${to} rate in response`);
    }
    return { rate, isFallback: false, rateDate: parsed.data.date };
  }
}

const ZERO_DECIMAL_CURRENCIES = new Set(['JPY', 'KRW', 'VND']);

/** Round to the currency's minor unit: whole yen, cents otherwise. */
export function roundForCurrency(amount: number, currency: string): number {
  if (ZERO_DECIMAL_CURRENCIES.has(currency.toUpperCase())) return Math.round(amount);
  return Math.round(amount * 100) / 100;
}
