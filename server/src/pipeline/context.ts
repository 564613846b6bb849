import { randomUUID } from 'node:crypto';
import { createRunLogger, type Logger } from '../lib/logger.js';
import { startOfUtcDay } from '../extraction/dates.js';

/**
 * State scoped to one pipeline run, passed explicitly to every stage.
 */
export interface PipelineContext {
  readonly runId: string;
  readonly logger: Logger;
  /** Records selected with empty text this run; never re-offered until a selection comes back empty. */
  readonly skippedIds: Set<number>;
  now(): Date;
  /** UTC midnight of `now()`. */
  today(): Date;
}

export interface PipelineContextOptions {
  runId?: string;
  logger?: Logger;
  clock?: () => Date;
}

export function createPipelineContext(options: PipelineContextOptions = {}): PipelineContext {
  const runId = options.runId ?? randomUUID();
  const clock = options.clock ?? (() => new Date());
  return {
    runId,
    logger: options.logger ?? createRunLogger(runId),
    skippedIds: new Set<number>(),
    now: clock,
    today: () => startOfUtcDay(clock()),
  };
}
