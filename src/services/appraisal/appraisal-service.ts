import pino from 'pino';
import { systemClock, type Clock } from '../../utils/clock.js';
import { buildCacheKey, type ResultCache } from '../cache/result-cache.js';
import { roundForCurrency, type CurrencyConversion } from '../exchange-rate/exchange-rate-service.js';
import { createPipelineContext, type Logger } from '../logger/correlation.js';
import { fetcherStage, type SourceFetcher } from '../sources/types.js';
import { confidenceFor, type CandidateSelector } from './candidate-selector.js';
import { firstSuccess } from './pipeline.js';
import { comparePriceToMarket, type PriceComparison } from './price-comparison.js';
import type { AppraisalOutcome, CardIdentity, ResolvedValue } from './types.js';

export interface AppraisalServiceDeps {
  /** Price tiers in priority order; the mock estimator goes last */
  sources: SourceFetcher[];
  selector: CandidateSelector;
  converter: CurrencyConversion;
  cache: ResultCache<ResolvedValue>;
  sourceCurrency: string;
  targetCurrency: string;
  logger?: Logger;
  clock?: Clock;
}

export interface ResolveOptions {
  forceRefresh?: boolean;
}

export interface ListingAppraisal {
  outcome: AppraisalOutcome;
  comparison: PriceComparison | null;
}

const UNABLE_TO_ESTIMATE: AppraisalOutcome = {
  ok: false,
  reason: 'unable_to_estimate',
  message: 'No price source produced a value for this card',
};

/**
 * Resolves a card identity to a market value:
 * cache → tiered fetch → filter cascade → disambiguation → cheapest → convert → cache.
 */
export class AppraisalService {
  private readonly log: Logger;
  private readonly clock: Clock;

  constructor(private readonly deps: AppraisalServiceDeps) {
    this.log = deps.logger ?? pino({ name: 'appraisal' });
    this.clock = deps.clock ?? systemClock;
  }

  async resolveMarketValue(identity: CardIdentity, options: ResolveOptions = {}): Promise<AppraisalOutcome> {
    const ctx = createPipelineContext('appraisal');
    const key = buildCacheKey(identity);

    if (options.forceRefresh) {
      this.log.info({ ...ctx, name: identity.name }, 'Force refresh, bypassing cache');
    } else {
      const hit = this.deps.cache.get(key);
      if (hit) {
        this.log.debug({ ...ctx, name: identity.name }, 'Cache hit');
        return { ok: true, value: hit, cached: true };
      }
    }

    const fetched = await firstSuccess(this.deps.sources.map(fetcherStage), identity, ctx, this.log);
    if (!fetched.winner) {
      this.log.warn({ ...ctx, name: identity.name, trace: fetched.trace }, 'No tier produced candidates');
      return UNABLE_TO_ESTIMATE;
    }

    const selection = await this.deps.selector.select(identity, fetched.winner.value, ctx);
    if (!selection) return UNABLE_TO_ESTIMATE;

    const { sourceCurrency, targetCurrency } = this.deps;
    const sourceAmount = roundForCurrency(selection.pick.price, sourceCurrency);
    const conversion = await this.deps.converter.convert(sourceAmount, sourceCurrency, targetCurrency);

    const value: ResolvedValue = {
      sourceAmount,
      sourceCurrency,
      targetAmount: roundForCurrency(conversion.amount, targetCurrency),
      targetCurrency,
      exchangeRate: conversion.rate,
      rateIsFallback: conversion.isFallback,
      rateDate: conversion.rateDate,
      confidence: confidenceFor(selection.pick.source, selection.ambiguous),
      source: selection.pick.source,
      matchedLabel: selection.pick.label,
      resolvedAt: new Date(this.clock.now()).toISOString(),
    };

    this.deps.cache.set(key, value);
    this.log.info(
      {
        ...ctx,
        name: identity.name,
        source: value.source,
        sourceAmount: value.sourceAmount,
        targetAmount: value.targetAmount,
        confidence: value.confidence,
        cacheSize: this.deps.cache.size(),
      },
      'Market value resolved',
    );
    return { ok: true, value, cached: false };
  }

  /** Resolve, then compare a listed price (target currency) against the market value. */
  async appraiseListing(
    identity: CardIdentity,
    listedPrice: number,
    options: ResolveOptions = {},
  ): Promise<ListingAppraisal> {
    const outcome = await this.resolveMarketValue(identity, options);
    if (!outcome.ok) return { outcome, comparison: null };
    return { outcome, comparison: comparePriceToMarket(listedPrice, outcome.value.targetAmount) };
  }
}
