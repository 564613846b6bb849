import baseLogger, { type Logger } from '../lib/logger.js';
import { withRetry } from '../lib/retry.js';
import { ALL_FIELDS, toColumnName, type ParsedFieldSet } from '../extraction/fields.js';
import { isRetryableStoreError } from './db-errors.js';
import type { CandidateRow, CandidateStore } from './candidate-store.js';

export interface WriteOutcome {
  ok: boolean;
  message: string;
  /** Which statement ran; absent when the write never got that far. */
  mode?: 'insert' | 'update';
}

export interface PersistenceOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  logger?: Logger;
}

export const PROCESSED_AT_COLUMN = 'processed_at';

/**
 * Row for an UPDATE: unknown or empty fields are left out so earlier good
 * values survive. `processed_at` is always written.
 */
export function buildUpdateRow(fields: ParsedFieldSet, processedAt: Date): CandidateRow {
  const row: CandidateRow = {};
  for (const [field, value] of fields.knownEntries()) {
    row[toColumnName(field)] = value;
  }
  row[PROCESSED_AT_COLUMN] = processedAt.toISOString();
  return row;
}

/** Row for an INSERT: every field column present, unknowns as NULL. */
export function buildInsertRow(fields: ParsedFieldSet, processedAt: Date): CandidateRow {
  const row: CandidateRow = {};
  for (const field of ALL_FIELDS) {
    row[toColumnName(field)] = fields.get(field);
  }
  row[PROCESSED_AT_COLUMN] = processedAt.toISOString();
  return row;
}

/**
 * Idempotent upsert of one record's extracted fields. Deadlocks, timeouts and
 * dropped connections are retried with backoff; every other store error
 * fails at once. Never throws.
 */
export class PersistenceWriter {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly logger: Logger;

  constructor(private readonly store: CandidateStore, options: PersistenceOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 500;
    this.logger = options.logger ?? baseLogger;
  }

  async write(id: number, fields: ParsedFieldSet, processedAt: Date = new Date()): Promise<WriteOutcome> {
    const log = this.logger.child({ recordId: id });
    try {
      return await withRetry(async () => {
        if (await this.store.exists(id)) {
          await this.store.update(id, buildUpdateRow(fields, processedAt));
          return { ok: true, mode: 'update' as const, message: `Updated record ${id}` };
        }
        await this.store.insert(id, buildInsertRow(fields, processedAt));
        return { ok: true, mode: 'insert' as const, message: `Inserted record ${id}` };
      }, {
        maxAttempts: this.maxAttempts,
        baseDelay: this.baseDelayMs,
        isRetryable: (_error, raw) => isRetryableStoreError(raw),
        onRetry: (attempt, error) => {
          log.warn({ attempt, error: error.message }, 'Retrying record write after transient store error');
        },
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error({ error: message }, 'Record write failed');
      return { ok: false, message };
    }
  }
}
