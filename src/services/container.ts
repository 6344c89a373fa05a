import type pg from 'pg';
import pino from 'pino';
import { config } from '../config/index.js';
import { AppraisalService } from './appraisal/appraisal-service.js';
import { CandidateSelector } from './appraisal/candidate-selector.js';
import { Disambiguator } from './appraisal/disambiguator.js';
import { MockEstimator } from './appraisal/mock-estimate.js';
import type { ResolvedValue } from './appraisal/types.js';
import { ResultCache } from './cache/result-cache.js';
import { PgCatalogProvider } from './catalog/catalog-provider.js';
import { CurrencyConverter } from './exchange-rate/exchange-rate-service.js';
import { JobScheduler } from './jobs/scheduler.js';
import type { Logger } from './logger/correlation.js';
import { GeminiOracle } from './oracle/gemini-oracle.js';
import { PriceChartingApiFetcher } from './pricecharting/api-fetcher.js';
import { PriceChartingSearchFetcher } from './pricecharting/search-fetcher.js';
import { BatchJobController } from './price-tracker/batch-job.js';
import { BatchRevaluationRunner } from './price-tracker/batch-runner.js';
import { PgSettingsStore } from './price-tracker/settings-store.js';
import { PgSnapshotStore } from './price-tracker/snapshot-store.js';
import { createBatchLimiter, createOracleLimiter } from './rate-limit/limiters.js';

function createLogger(name: string): Logger {
  return pino({ name, level: config.LOG_LEVEL });
}

/**
 * Composition root: the only place that reads configuration. Everything
 * below receives its options and collaborators through constructors.
 */
export function createServices(pool: pg.Pool) {
  const primary = new PriceChartingApiFetcher({
    apiKey: config.PRICECHARTING_API_KEY,
    timeoutMs: config.SOURCE_TIMEOUT_MS,
    logger: createLogger('pricecharting-api'),
  });
  const search = new PriceChartingSearchFetcher({
    timeoutMs: config.SOURCE_TIMEOUT_MS,
    logger: createLogger('pricecharting-search'),
  });

  const oracle = config.GEMINI_API_KEY
    ? GeminiOracle.fromApiKey(config.GEMINI_API_KEY, {
        model: config.GEMINI_MODEL,
        timeoutMs: config.ORACLE_TIMEOUT_MS,
      })
    : null;
  const disambiguator = new Disambiguator(oracle, {
    threshold: config.DISAMBIGUATION_THRESHOLD,
    maxCandidates: config.DISAMBIGUATION_MAX_CANDIDATES,
    timeoutMs: config.ORACLE_TIMEOUT_MS,
    limiter: createOracleLimiter(),
    logger: createLogger('disambiguator'),
  });
  const selector = new CandidateSelector(disambiguator, createLogger('selector'));

  const converter = new CurrencyConverter({
    baseUrl: config.FX_API_URL,
    timeoutMs: config.FX_TIMEOUT_MS,
    fallbackRate: config.FX_FALLBACK_RATE,
    logger: createLogger('exchange-rate'),
  });

  const appraisal = new AppraisalService({
    sources: [primary, search, new MockEstimator()],
    selector,
    converter,
    cache: new ResultCache<ResolvedValue>(config.APPRAISAL_CACHE_TTL_SECONDS),
    sourceCurrency: config.SOURCE_CURRENCY,
    targetCurrency: config.TARGET_CURRENCY,
    logger: createLogger('appraisal'),
  });

  const catalog = new PgCatalogProvider(pool);
  const snapshots = new PgSnapshotStore(pool);
  const settings = new PgSettingsStore(pool);

  const runner = new BatchRevaluationRunner({
    primary,
    selector,
    converter,
    snapshots,
    settings,
    limiter: createBatchLimiter(config.BATCH_MIN_INTERVAL_MS),
    sourceCurrency: config.SOURCE_CURRENCY,
    targetCurrency: config.TARGET_CURRENCY,
    progressEvery: config.BATCH_PROGRESS_EVERY,
    logger: createLogger('price-tracker'),
  });
  const controller = new BatchJobController({
    runner,
    catalog,
    settings,
    logger: createLogger('price-batch'),
  });

  return {
    appraisal,
    catalog,
    snapshots,
    settings,
    controller,
    scheduler: new JobScheduler(undefined, createLogger('scheduler')),
    oracleEnabled: oracle !== null,
    primaryConfigured: primary.configured,
  };
}

export type Services = ReturnType<typeof createServices>;
