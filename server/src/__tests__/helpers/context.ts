import pino from 'pino';
import { createPipelineContext, type PipelineContext } from '../../pipeline/context.js';

export const silentLogger = pino({ level: 'silent' });

export function createTestContext(now: Date = new Date('2024-06-15T12:00:00Z')): PipelineContext {
  return createPipelineContext({ runId: 'test-run', logger: silentLogger, clock: () => now });
}
