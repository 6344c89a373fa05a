import Bottleneck from 'bottleneck';

/**
 * Primary-source limiter for batch revaluation: one request in flight, each
 * start at least `minIntervalMs` after the previous one.
 */
export function createBatchLimiter(minIntervalMs: number): Bottleneck {
  return new Bottleneck({
    maxConcurrent: 1,
    minTime: minIntervalMs,
  });
}

/** Process-wide slot for disambiguation oracle calls. */
export function createOracleLimiter(): Bottleneck {
  return new Bottleneck({ maxConcurrent: 1 });
}
