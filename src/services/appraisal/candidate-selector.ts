import type { Logger, PipelineContext } from '../logger/correlation.js';
import { disambiguationStage, type Disambiguator } from './disambiguator.js';
import { buildFilterCascade } from './filter-cascade.js';
import { narrow, type StageTrace } from './pipeline.js';
import type { CandidateSource, CardIdentity, Confidence, PriceCandidate } from './types.js';

export interface Selection {
  pick: PriceCandidate;
  narrowed: PriceCandidate[];
  /** More than one candidate survived and the oracle could not settle it */
  ambiguous: boolean;
  trace: StageTrace[];
}

/** Lowest price wins; on a tie the earlier candidate is kept. */
export function selectCheapest(candidates: readonly PriceCandidate[]): PriceCandidate | null {
  let best: PriceCandidate | null = null;
  for (const candidate of candidates) {
    if (best === null || candidate.price < best.price) best = candidate;
  }
  return best;
}

const SOURCE_CONFIDENCE: Record<CandidateSource, Confidence> = {
  'catalog-api': 'high',
  'html-search': 'medium',
  'mock-estimate': 'low',
};

export function confidenceFor(source: CandidateSource, ambiguous: boolean): Confidence {
  const base = SOURCE_CONFIDENCE[source];
  return ambiguous && base === 'high' ? 'medium' : base;
}

/**
 * Filter cascade, then disambiguation, then the cheapest survivor.
 * Shared by interactive appraisal and the batch runner.
 */
export class CandidateSelector {
  constructor(
    private readonly disambiguator: Disambiguator,
    private readonly log: Logger,
  ) {}

  async select(
    identity: CardIdentity,
    candidates: PriceCandidate[],
    ctx: PipelineContext,
  ): Promise<Selection | null> {
    if (candidates.length === 0) return null;

    const stages = [...buildFilterCascade(identity), disambiguationStage(this.disambiguator, identity)];
    const { value: narrowed, trace } = await narrow(stages, candidates, ctx, this.log);
    const pick = selectCheapest(narrowed);
    if (!pick) return null;

    const oracleStep = trace.find((t) => t.stage === 'disambiguate');
    const ambiguous = narrowed.length > 1 && (oracleStep?.kind === 'empty' || oracleStep?.kind === 'error');

    this.log.debug(
      { ...ctx, received: candidates.length, narrowed: narrowed.length, pick: pick.label, price: pick.price },
      'Candidate selected',
    );
    return { pick, narrowed, ambiguous, trace };
  }
}
