import Bottleneck from 'bottleneck';
import pino from 'pino';
import { OracleFailureError, toErrorObject } from '../../utils/errors.js';
import type { Logger, PipelineContext } from '../logger/correlation.js';
import { empty, skipped, success, type Stage } from './pipeline.js';
import {
  buildSearchQuery,
  targetLanguage,
  type CardIdentity,
  type CardLanguage,
  type PriceCandidate,
} from './types.js';

export interface DisambiguationRequest {
  query: string;
  language: CardLanguage;
  cardNumber?: string;
  candidates: PriceCandidate[];
}

/**
 * Picks which numbered candidates match the query. Returns 1-based indices
 * into `request.candidates`; throws on any failure. Should stop work once
 * `signal` aborts.
 */
export interface DisambiguationOracle {
  readonly name: string;
  selectMatches(request: DisambiguationRequest, signal?: AbortSignal): Promise<number[]>;
}

export type DisambiguationStatus = 'skipped' | 'selected' | 'fallback';

export interface DisambiguationResult {
  status: DisambiguationStatus;
  candidates: PriceCandidate[];
  oracleCalled: boolean;
}

export interface DisambiguatorOptions {
  /** Oracle is consulted only when there are more candidates than this */
  threshold?: number;
  maxCandidates?: number;
  timeoutMs?: number;
  /** Share one limiter (createOracleLimiter) to serialize oracle calls across all callers */
  limiter?: Bottleneck;
  logger?: Logger;
}

export class Disambiguator {
  private readonly threshold: number;
  private readonly maxCandidates: number;
  private readonly timeoutMs: number;
  private readonly limiter: Bottleneck;
  private readonly log: Logger;

  constructor(
    private readonly oracle: DisambiguationOracle | null,
    options: DisambiguatorOptions = {},
  ) {
    this.threshold = options.threshold ?? 3;
    this.maxCandidates = options.maxCandidates ?? 20;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.limiter = options.limiter ?? new Bottleneck({ maxConcurrent: 1 });
    this.log = options.logger ?? pino({ name: 'disambiguator' });
  }

  async disambiguate(
    identity: CardIdentity,
    candidates: PriceCandidate[],
    ctx: PipelineContext,
  ): Promise<DisambiguationResult> {
    if (candidates.length <= this.threshold) {
      return { status: 'skipped', candidates, oracleCalled: false };
    }
    if (!this.oracle) {
      this.log.debug({ ...ctx, count: candidates.length }, 'No oracle configured, keeping all candidates');
      return { status: 'fallback', candidates, oracleCalled: false };
    }

    const oracle = this.oracle;
    const sent = candidates.slice(0, this.maxCandidates);
    const request: DisambiguationRequest = {
      query: buildSearchQuery(identity),
      language: targetLanguage(identity),
      cardNumber: identity.cardNumber,
      candidates: sent,
    };

    try {
      const indices = await this.callOracle(oracle, request);
      const selected = pickByIndex(sent, indices);

      if (selected.length === 0) {
        this.log.warn({ ...ctx, oracle: oracle.name, indices }, 'Oracle returned no usable indices');
        return { status: 'fallback', candidates, oracleCalled: true };
      }

      this.log.info(
        { ...ctx, oracle: oracle.name, sent: sent.length, selected: selected.length },
        'Oracle narrowed candidates',
      );
      return { status: 'selected', candidates: selected, oracleCalled: true };
    } catch (err) {
      this.log.warn({ ...ctx, oracle: oracle.name, err: toErrorObject(err) }, 'Oracle call failed');
      return { status: 'fallback', candidates, oracleCalled: true };
    }
  }

  /**
   * The caller gives up after `timeoutMs` and the call is aborted, but the
   * limiter slot is held until the oracle call itself settles.
   */
  private callOracle(oracle: DisambiguationOracle, request: DisambiguationRequest): Promise<number[]> {
    return new Promise<number[]>((resolve, reject) => {
      this.limiter
        .schedule(async () => {
          const controller = new AbortController();
          const timeout = setTimeout(() => {
            controller.abort();
            reject(new OracleFailureError(`no verdict within ${this.timeoutMs} ms`));
          }, this.timeoutMs);
          try {
            resolve(await oracle.selectMatches(request, controller.signal));
          } catch (err) {
            reject(err);
          } finally {
            clearTimeout(timeout);
          }
        })
        .catch(reject);
    });
  }
}

/** Map 1-based indices onto candidates, dropping out-of-range values and duplicates. */
export function pickByIndex(candidates: PriceCandidate[], indices: readonly number[]): PriceCandidate[] {
  const seen = new Set<number>();
  const picked: PriceCandidate[] = [];
  for (const index of indices) {
    if (!Number.isInteger(index) || index < 1 || index > candidates.length || seen.has(index)) continue;
    seen.add(index);
    picked.push(candidates[index - 1]);
  }
  return picked;
}

/** Adapts the disambiguator to the narrowing walker; a fallback keeps the previous set. */
export function disambiguationStage(
  disambiguator: Disambiguator,
  identity: CardIdentity,
): Stage<PriceCandidate[], PriceCandidate[]> {
  return {
    name: 'disambiguate',
    async run(candidates, ctx) {
      const result = await disambiguator.disambiguate(identity, candidates, ctx);
      switch (result.status) {
        case 'skipped':
          return skipped(`${candidates.length} candidates, below oracle threshold`);
        case 'fallback':
          return empty('oracle gave no verdict');
        case 'selected':
          return success(result.candidates);
      }
    },
  };
}
