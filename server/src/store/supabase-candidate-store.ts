import { z } from 'zod';
import { getSupabaseAdmin } from '../lib/supabase.js';
import { toStoreError } from './db-errors.js';
import type { CandidateRecord, CandidateRow, CandidateStore, ClaimableQuery } from './candidate-store.js';

const RECORD_COLUMNS = 'id, raw_text, ready_at, claimed_at, processed_at';
const MS_PER_DAY = 86_400_000;

const RecordRowSchema = z.object({
  id: z.coerce.number().int(),
  raw_text: z.string().nullable(),
  ready_at: z.string().nullable(),
  claimed_at: z.string().nullable(),
  processed_at: z.string().nullable(),
});

const IdRowsSchema = z.array(z.object({ id: z.coerce.number().int() }));

function toRecord(row: z.infer<typeof RecordRowSchema>): CandidateRecord {
  return {
    id: row.id,
    rawText: row.raw_text,
    readyAt: row.ready_at,
    claimedAt: row.claimed_at,
    processedAt: row.processed_at,
  };
}

interface QueryResult<T> {
  data: T;
  error: unknown;
  count?: number | null;
}

/** Candidate table accessed through the Supabase service-role client. */
export class SupabaseCandidateStore implements CandidateStore {
  constructor(private readonly table = 'candidates') {}

  private async run<T>(operation: string, query: () => PromiseLike<QueryResult<T>>): Promise<QueryResult<T>> {
    let result: QueryResult<T>;
    try {
      result = await query();
    } catch (err) {
      throw toStoreError(err, operation);
    }
    if (result.error) throw toStoreError(result.error, operation);
    return result;
  }

  async selectClaimable({ windowDays, limit, now }: ClaimableQuery): Promise<CandidateRecord[]> {
    const since = new Date(now.getTime() - windowDays * MS_PER_DAY).toISOString();
    const { data } = await this.run('selectClaimable', () => getSupabaseAdmin()
      .from(this.table)
      .select(RECORD_COLUMNS)
      .is('claimed_at', null)
      .is('processed_at', null)
      .not('raw_text', 'is', null)
      .neq('raw_text', '')
      .gte('ready_at', since)
      .order('ready_at', { ascending: false })
      .limit(limit));
    return z.array(RecordRowSchema).parse(data ?? []).map(toRecord);
  }

  async getById(id: number): Promise<CandidateRecord | null> {
    const { data } = await this.run('getById', () => getSupabaseAdmin()
      .from(this.table)
      .select(RECORD_COLUMNS)
      .eq('id', id)
      .maybeSingle());
    return data ? toRecord(RecordRowSchema.parse(data)) : null;
  }

  async claim(id: number, claimedAt: Date): Promise<boolean> {
    const { data } = await this.run('claim', () => getSupabaseAdmin()
      .from(this.table)
      .update({ claimed_at: claimedAt.toISOString() })
      .eq('id', id)
      .is('claimed_at', null)
      .select('id'));
    return IdRowsSchema.parse(data ?? []).length > 0;
  }

  async exists(id: number): Promise<boolean> {
    const { count } = await this.run('exists', () => getSupabaseAdmin()
      .from(this.table)
      .select('id', { count: 'exact', head: true })
      .eq('id', id));
    return (count ?? 0) > 0;
  }

  async update(id: number, row: CandidateRow): Promise<void> {
    await this.run('update', () => getSupabaseAdmin()
      .from(this.table)
      .update(row)
      .eq('id', id));
  }

  async insert(id: number, row: CandidateRow): Promise<void> {
    await this.run('insert', () => getSupabaseAdmin()
      .from(this.table)
      .insert({ ...row, id }));
  }

  async ping(): Promise<boolean> {
    try {
      await this.run('ping', () => getSupabaseAdmin().from(this.table).select('id').limit(1));
      return true;
    } catch {
      return false;
    }
  }
}
