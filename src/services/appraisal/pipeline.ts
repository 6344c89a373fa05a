import { toErrorObject } from '../../utils/errors.js';
import type { Logger, PipelineContext } from '../logger/correlation.js';

export type StageOutcome<T> =
  | { kind: 'success'; value: T }
  | { kind: 'empty'; reason?: string }
  | { kind: 'skipped'; reason: string }
  | { kind: 'error'; error: unknown };

export interface Stage<I, O> {
  readonly name: string;
  run(input: I, ctx: PipelineContext): Promise<StageOutcome<O>>;
}

export interface StageTrace {
  stage: string;
  kind: StageOutcome<unknown>['kind'];
  /** Size of the working set after the stage, for list-valued stages */
  count?: number;
}

export function success<T>(value: T): StageOutcome<T> {
  return { kind: 'success', value };
}

export function empty<T>(reason?: string): StageOutcome<T> {
  return reason ? { kind: 'empty', reason } : { kind: 'empty' };
}

export function skipped<T>(reason: string): StageOutcome<T> {
  return { kind: 'skipped', reason };
}

async function runStage<I, O>(
  stage: Stage<I, O>,
  input: I,
  ctx: PipelineContext,
): Promise<StageOutcome<O>> {
  try {
    return await stage.run(input, ctx);
  } catch (error) {
    return { kind: 'error', error };
  }
}

function logOutcome(
  logger: Logger,
  ctx: PipelineContext,
  stage: string,
  outcome: StageOutcome<unknown>,
  count?: number,
): void {
  switch (outcome.kind) {
    case 'error':
      logger.warn({ ...ctx, stage, err: toErrorObject(outcome.error) }, 'Stage failed');
      break;
    case 'skipped':
    case 'empty':
      logger.debug({ ...ctx, stage, kind: outcome.kind, reason: outcome.reason }, 'Stage produced nothing');
      break;
    case 'success':
      logger.debug({ ...ctx, stage, count }, 'Stage succeeded');
      break;
  }
}

/**
 * Walk tiers in priority order and stop at the first one that succeeds.
 */
export async function firstSuccess<I, O>(
  stages: ReadonlyArray<Stage<I, O>>,
  input: I,
  ctx: PipelineContext,
  logger: Logger,
): Promise<{ winner: { stage: string; value: O } | null; trace: StageTrace[] }> {
  const trace: StageTrace[] = [];

  for (const stage of stages) {
    const outcome = await runStage(stage, input, ctx);
    trace.push({ stage: stage.name, kind: outcome.kind });
    logOutcome(logger, ctx, stage.name, outcome);

    if (outcome.kind === 'success') {
      return { winner: { stage: stage.name, value: outcome.value }, trace };
    }
  }

  return { winner: null, trace };
}

/**
 * Apply narrowing stages in order. A stage that fails, is skipped, or
 * would leave nothing keeps the previous working set: the set only shrinks
 * and never empties.
 */
export async function narrow<T>(
  stages: ReadonlyArray<Stage<T[], T[]>>,
  input: T[],
  ctx: PipelineContext,
  logger: Logger,
): Promise<{ value: T[]; trace: StageTrace[] }> {
  const trace: StageTrace[] = [];
  let current = input;

  for (const stage of stages) {
    let outcome = await runStage(stage, current, ctx);
    if (outcome.kind === 'success' && outcome.value.length === 0) {
      outcome = empty('no matches, keeping previous set');
    }
    if (outcome.kind === 'success') {
      current = outcome.value;
    }
    trace.push({ stage: stage.name, kind: outcome.kind, count: current.length });
    logOutcome(logger, ctx, stage.name, outcome, current.length);
  }

  return { value: current, trace };
}
