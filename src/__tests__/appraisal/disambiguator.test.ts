import { describe, it, expect, vi } from 'vitest';
import Bottleneck from 'bottleneck';
import {
  Disambiguator,
  disambiguationStage,
  pickByIndex,
  type DisambiguationOracle,
  type DisambiguationRequest,
} from '../../services/appraisal/disambiguator.js';
import { narrow } from '../../services/appraisal/pipeline.js';
import { candidate, identity, silentLogger, testContext } from '../helpers/fakes.js';

const card = identity({ name: 'Pikachu', cardNumber: '25' });
const candidates = (n: number) => Array.from({ length: n }, (_, i) => candidate(`Pikachu #${i + 1}`, i + 1));

function fakeOracle(impl: (request: DisambiguationRequest, signal?: AbortSignal) => Promise<number[]>) {
  const selectMatches = vi.fn(impl);
  const oracle: DisambiguationOracle = { name: 'fake', selectMatches };
  return { oracle, selectMatches };
}

describe('Disambiguator', () => {
  it('does not consult the oracle at or below the threshold', async () => {
    const { oracle, selectMatches } = fakeOracle(async () => [1]);
    const result = await new Disambiguator(oracle, { logger: silentLogger }).disambiguate(
      card,
      candidates(3),
      testContext,
    );

    expect(result).toEqual({ status: 'skipped', candidates: candidates(3), oracleCalled: false });
    expect(selectMatches).not.toHaveBeenCalled();
  });

  it('keeps the candidates the oracle selects', async () => {
    const { oracle } = fakeOracle(async () => [2, 4]);
    const pool = candidates(5);
    const result = await new Disambiguator(oracle, { logger: silentLogger }).disambiguate(card, pool, testContext);

    expect(result.status).toBe('selected');
    expect(result.candidates).toEqual([pool[1], pool[3]]);
  });

  it('sends at most the configured number of candidates', async () => {
    const { oracle, selectMatches } = fakeOracle(async () => [1]);
    await new Disambiguator(oracle, { logger: silentLogger }).disambiguate(card, candidates(25), testContext);

    expect(selectMatches).toHaveBeenCalledTimes(1);
    const request = selectMatches.mock.calls[0][0];
    expect(request.candidates).toHaveLength(20);
    expect(request.query).toBe('Pikachu 25');
    expect(request.language).toBe('english');
  });

  it('falls back to the full set when the oracle fails', async () => {
    const { oracle } = fakeOracle(async () => {
      throw new Error('quota exceeded');
    });
    const pool = candidates(5);
    const result = await new Disambiguator(oracle, { logger: silentLogger }).disambiguate(card, pool, testContext);

    expect(result).toEqual({ status: 'fallback', candidates: pool, oracleCalled: true });
  });

  it('falls back when the verdict has no usable indices', async () => {
    const { oracle } = fakeOracle(async () => [0, 9]);
    const pool = candidates(5);
    const result = await new Disambiguator(oracle, { logger: silentLogger }).disambiguate(card, pool, testContext);

    expect(result.status).toBe('fallback');
    expect(result.candidates).toEqual(pool);
  });

  it('falls back and aborts the call when the oracle exceeds its timeout', async () => {
    let aborted = false;
    const { oracle } = fakeOracle(
      (_request, signal) =>
        new Promise<number[]>((_resolve, reject) => {
          signal?.addEventListener('abort', () => {
            aborted = true;
            reject(new Error('aborted'));
          });
        }),
    );
    const pool = candidates(5);
    const result = await new Disambiguator(oracle, { logger: silentLogger, timeoutMs: 20 }).disambiguate(
      card,
      pool,
      testContext,
    );

    expect(result.status).toBe('fallback');
    expect(result.candidates).toEqual(pool);
    expect(aborted).toBe(true);
  });

  it('does not start the next oracle call until a timed-out one has settled', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    // Ignores the abort signal and finishes late
    const { oracle, selectMatches } = fakeOracle(async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 100));
      inFlight--;
      return [1];
    });
    const limiter = new Bottleneck({ maxConcurrent: 1 });
    const options = { limiter, logger: silentLogger, timeoutMs: 20 };

    const results = await Promise.all([
      new Disambiguator(oracle, options).disambiguate(card, candidates(5), testContext),
      new Disambiguator(oracle, options).disambiguate(card, candidates(5), testContext),
    ]);

    expect(results.map((r) => r.status)).toEqual(['fallback', 'fallback']);
    await vi.waitFor(() => expect(selectMatches).toHaveBeenCalledTimes(2));
    await vi.waitFor(() => expect(inFlight).toBe(0));
    expect(maxInFlight).toBe(1);
  });

  it('is a no-op without an oracle', async () => {
    const pool = candidates(6);
    const result = await new Disambiguator(null, { logger: silentLogger }).disambiguate(card, pool, testContext);

    expect(result).toEqual({ status: 'fallback', candidates: pool, oracleCalled: false });
  });

  it('serializes oracle calls through a shared limiter', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const { oracle, selectMatches } = fakeOracle(async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return [1];
    });
    const limiter = new Bottleneck({ maxConcurrent: 1 });
    const first = new Disambiguator(oracle, { limiter, logger: silentLogger });
    const second = new Disambiguator(oracle, { limiter, logger: silentLogger });

    await Promise.all([
      first.disambiguate(card, candidates(5), testContext),
      second.disambiguate(card, candidates(5), testContext),
      first.disambiguate(card, candidates(5), testContext),
    ]);

    expect(selectMatches).toHaveBeenCalledTimes(3);
    expect(maxInFlight).toBe(1);
  });
});

describe('pickByIndex', () => {
  it('maps 1-based indices and ignores duplicates and out-of-range values', () => {
    const pool = candidates(4);
    expect(pickByIndex(pool, [3, 0, 3, 5, 1])).toEqual([pool[2], pool[0]]);
  });
});

describe('disambiguationStage', () => {
  it('keeps the previous set when the oracle gives no verdict', async () => {
    const { oracle } = fakeOracle(async () => []);
    const stage = disambiguationStage(new Disambiguator(oracle, { logger: silentLogger }), card);
    const pool = candidates(5);
    const { value, trace } = await narrow([stage], pool, testContext, silentLogger);

    expect(value).toEqual(pool);
    expect(trace).toEqual([{ stage: 'disambiguate', kind: 'empty', count: 5 }]);
  });
});
