import { randomUUID } from 'crypto';
import pino from 'pino';

/**
 * Logger handed to every pipeline component. Components never write to the
 * console directly; they log through whichever instance they were given.
 */
export type Logger = pino.Logger;

/**
 * Generate a short correlation ID for tracing one appraisal or batch item.
 * Uses first 8 chars of a UUID for brevity in logs.
 */
export function generateCorrelationId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Context object passed through the pipeline.
 * Every stage receives this and includes it in log calls.
 */
export interface PipelineContext {
  correlationId: string;
  service: 'appraisal' | 'price-tracker';
  itemId?: string;
}

export function createPipelineContext(
  service: PipelineContext['service'],
  itemId?: string,
): PipelineContext {
  return {
    correlationId: generateCorrelationId(),
    service,
    ...(itemId ? { itemId } : {}),
  };
}
