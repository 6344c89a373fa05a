import type { CandidateSource, CardIdentity, PriceCandidate } from '../appraisal/types.js';
import type { PipelineContext } from '../logger/correlation.js';
import { empty, success, type Stage } from '../appraisal/pipeline.js';

/**
 * A price source. `fetch` resolves to an empty list when the source is
 * unconfigured, unreachable, or has nothing for the identity.
 */
export interface SourceFetcher {
  readonly name: CandidateSource;
  readonly configured: boolean;
  fetch(identity: CardIdentity, ctx: PipelineContext): Promise<PriceCandidate[]>;
}

export function fetcherStage(fetcher: SourceFetcher): Stage<CardIdentity, PriceCandidate[]> {
  return {
    name: fetcher.name,
    async run(identity, ctx) {
      if (!fetcher.configured) return { kind: 'skipped', reason: 'not configured' };
      const candidates = await fetcher.fetch(identity, ctx);
      return candidates.length > 0 ? success(candidates) : empty('no candidates');
    },
  };
}
