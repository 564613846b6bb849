import { mapSettled } from '../lib/concurrency.js';
import type { BatchResultItem, BatchStatus } from '../batch/batch-client.js';
import { isSuccessStatus } from '../batch/batch-client.js';
import { parseItemId } from '../batch/item-id.js';
import { mergeExperienceMetrics, type UsLocationMatcher } from '../extraction/experience.js';
import { validateFields, type ValidationIssue } from '../extraction/field-validator.js';
import type { ParsedFieldSet } from '../extraction/fields.js';
import type { PhrasingCatalog } from '../extraction/phrasings.js';
import { parseResponse, type ParseDiagnostics } from '../extraction/response-parser.js';
import type { PersistenceWriter } from '../store/persistence-writer.js';
import type { PipelineContext } from './context.js';

export interface RecordOutcome {
  recordId: number;
  ok: boolean;
  message: string;
  fields?: ParsedFieldSet;
  issues?: ValidationIssue[];
  diagnostics?: ParseDiagnostics;
}

export interface BatchSummary {
  jobId: string | null;
  status: BatchStatus;
  total: number;
  succeeded: number;
  failed: number;
  failedIds: number[];
}

export interface JobMembers {
  jobId: string;
  memberIds: readonly number[];
}

export interface ResultProcessorOptions {
  writer: PersistenceWriter;
  workers: number;
  computedExperience: boolean;
  catalog?: PhrasingCatalog;
  usMatcher?: UsLocationMatcher;
}

export function summarize(
  jobId: string | null,
  status: BatchStatus,
  outcomes: readonly RecordOutcome[],
): BatchSummary {
  const failedIds = outcomes.filter((outcome) => !outcome.ok).map((outcome) => outcome.recordId);
  return {
    jobId,
    status,
    total: outcomes.length,
    succeeded: outcomes.length - failedIds.length,
    failed: failedIds.length,
    failedIds,
  };
}

/**
 * Routes model output for each record through parse, experience merge,
 * validation and persistence. Records fail independently of each other.
 */
export class ResultProcessor {
  constructor(private readonly options: ResultProcessorOptions) {}

  async processRecord(recordId: number, body: string, ctx: PipelineContext): Promise<RecordOutcome> {
    const log = ctx.logger.child({ recordId });
    const parsed = parseResponse(body, { catalog: this.options.catalog, logger: log });
    if (parsed.fields.knownCount === 0) {
      log.error({ length: body.length }, 'Response produced no fields; record not written');
      return { recordId, ok: false, message: 'No fields extracted', diagnostics: parsed.diagnostics };
    }

    let fields = parsed.fields;
    if (this.options.computedExperience) {
      fields = mergeExperienceMetrics(fields, {
        today: ctx.today(),
        logger: log,
        usMatcher: this.options.usMatcher,
      }).fields;
    }

    const validated = validateFields(fields, { today: ctx.today(), logger: log });
    const write = await this.options.writer.write(recordId, validated.fields, ctx.now());
    if (!write.ok) {
      log.error({ error: write.message }, 'Failed to persist extracted fields');
    }
    return {
      recordId,
      ok: write.ok,
      message: write.message,
      fields: validated.fields,
      issues: validated.issues,
      diagnostics: parsed.diagnostics,
    };
  }

  /**
   * Handles the output of a completed job. Members with a non-2xx item, or
   * with no item at all, are counted as failed.
   */
  async processItems(job: JobMembers, items: readonly BatchResultItem[], ctx: PipelineContext): Promise<BatchSummary> {
    const log = ctx.logger.child({ jobId: job.jobId });
    const members = new Set(job.memberIds);
    const byRecord = new Map<number, BatchResultItem>();
    for (const item of items) {
      const recordId = parseItemId(item.itemId);
      if (recordId === null || !members.has(recordId)) {
        log.warn({ itemId: item.itemId }, 'Result item does not belong to this job');
        continue;
      }
      if (!byRecord.has(recordId)) byRecord.set(recordId, item);
    }

    const settled = await mapSettled(job.memberIds, this.options.workers, async (recordId): Promise<RecordOutcome> => {
      const item = byRecord.get(recordId);
      if (!item) {
        log.error({ recordId }, 'Record missing from batch output');
        return { recordId, ok: false, message: 'missing from output' };
      }
      if (!isSuccessStatus(item.statusCode)) {
        log.error({ recordId, statusCode: item.statusCode, error: item.error }, 'Batch item failed');
        return { recordId, ok: false, message: `item status ${item.statusCode}: ${item.error ?? 'unknown error'}` };
      }
      return this.processRecord(recordId, item.body, ctx);
    });

    const outcomes = settled.map((outcome, index): RecordOutcome => {
      if (outcome.ok) return outcome.value;
      const recordId = job.memberIds[index];
      const message = outcome.error instanceof Error ? outcome.error.message : String(outcome.error);
      log.error({ recordId, error: message }, 'Unexpected error while processing record');
      return { recordId, ok: false, message };
    });

    const summary = summarize(job.jobId, 'completed', outcomes);
    log.info(summary, 'Batch results processed');
    return summary;
  }

  /** Failed or expired job: every member is reported failed and stays claimed. */
  failJob(job: JobMembers, status: BatchStatus, ctx: PipelineContext): BatchSummary {
    const summary = summarize(job.jobId, status, job.memberIds.map((recordId) => ({
      recordId,
      ok: false,
      message: `job ${status}`,
    })));
    ctx.logger.error({ ...summary }, 'Batch job ended without results; member claims are not released');
    return summary;
  }
}
