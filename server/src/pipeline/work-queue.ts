import { mapSettled } from '../lib/concurrency.js';
import { withRetry } from '../lib/retry.js';
import { isRetryableStoreError } from '../store/db-errors.js';
import type { CandidateRecord, CandidateStore } from '../store/candidate-store.js';
import type { PipelineContext } from './context.js';

export interface ClaimedRecord {
  id: number;
  rawText: string;
}

export interface SelectOptions {
  windowDays: number;
  batchSize: number;
}

export interface ClaimOptions {
  workers: number;
  maxAttempts?: number;
  baseDelayMs?: number;
}

export interface ClaimOutcome {
  claimed: ClaimedRecord[];
  /** Another run claimed these between selection and our write. */
  lost: number[];
  failed: number[];
}

/**
 * Reads up to `batchSize` claimable records with usable text. Store outages
 * yield an empty list so the caller simply tries again next cycle.
 */
export async function selectWork(
  store: CandidateStore,
  ctx: PipelineContext,
  options: SelectOptions,
): Promise<ClaimedRecord[]> {
  let rows: CandidateRecord[];
  try {
    rows = await store.selectClaimable({
      windowDays: options.windowDays,
      limit: options.batchSize + ctx.skippedIds.size,
      now: ctx.now(),
    });
  } catch (err) {
    ctx.logger.warn({ error: err instanceof Error ? err.message : String(err) }, 'Claimable selection failed; will retry next cycle');
    return [];
  }

  if (rows.length === 0) {
    if (ctx.skippedIds.size > 0) {
      ctx.logger.debug({ cleared: ctx.skippedIds.size }, 'No claimable records; clearing skipped ids');
      ctx.skippedIds.clear();
    }
    return [];
  }

  const work: ClaimedRecord[] = [];
  for (const row of rows) {
    if (ctx.skippedIds.has(row.id)) continue;
    const rawText = row.rawText?.trim() ?? '';
    if (!rawText) {
      ctx.skippedIds.add(row.id);
      ctx.logger.warn({ recordId: row.id }, 'Skipping record with empty resume text');
      continue;
    }
    work.push({ id: row.id, rawText });
    if (work.length >= options.batchSize) break;
  }
  ctx.logger.info({ selected: rows.length, usable: work.length }, 'Selected claimable records');
  return work;
}

/**
 * Writes a claim for every record before any model call. A record whose
 * claim was lost or failed is dropped from the batch without affecting the
 * rest.
 */
export async function claimRecords(
  store: CandidateStore,
  ctx: PipelineContext,
  records: readonly ClaimedRecord[],
  options: ClaimOptions,
): Promise<ClaimOutcome> {
  const claimedAt = ctx.now();
  const outcomes = await mapSettled(records, options.workers, (record) => withRetry(
    () => store.claim(record.id, claimedAt),
    {
      maxAttempts: options.maxAttempts ?? 3,
      baseDelay: options.baseDelayMs ?? 500,
      isRetryable: (_error, raw) => isRetryableStoreError(raw),
    },
  ));

  const result: ClaimOutcome = { claimed: [], lost: [], failed: [] };
  outcomes.forEach((outcome, index) => {
    const record = records[index];
    if (!outcome.ok) {
      result.failed.push(record.id);
      ctx.logger.error({
        recordId: record.id,
        error: outcome.error instanceof Error ? outcome.error.message : String(outcome.error),
      }, 'Failed to claim record');
    } else if (outcome.value) {
      result.claimed.push(record);
    } else {
      result.lost.push(record.id);
      ctx.logger.debug({ recordId: record.id }, 'Record already claimed by another run');
    }
  });

  ctx.logger.info({
    claimed: result.claimed.length,
    lost: result.lost.length,
    failed: result.failed.length,
  }, 'Claimed records');
  return result;
}
