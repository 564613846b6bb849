import { describe, it, expect } from 'vitest';
import { ALL_FIELDS, ParsedFieldSet } from '../extraction/fields.js';
import { StoreError } from '../store/db-errors.js';
import { PersistenceWriter, buildInsertRow, buildUpdateRow } from '../store/persistence-writer.js';
import { silentLogger } from './helpers/context.js';
import { InMemoryCandidateStore } from './helpers/in-memory-store.js';

const processedAt = new Date('2024-06-15T12:00:00Z');
const readyAt = new Date('2024-06-10T00:00:00Z');

function createWriter(store: InMemoryCandidateStore) {
  return new PersistenceWriter(store, { maxAttempts: 3, baseDelayMs: 1, logger: silentLogger });
}

describe('row builders', () => {
  const fields = ParsedFieldSet.from({ firstName: 'Jane', lastName: null, job1StartDate: '2020-01-01' });

  it('leaves unknown fields out of updates', () => {
    expect(buildUpdateRow(fields, processedAt)).toEqual({
      first_name: 'Jane',
      job1_start_date: '2020-01-01',
      processed_at: '2024-06-15T12:00:00.000Z',
    });
  });

  it('writes every field column on insert', () => {
    const row = buildInsertRow(fields, processedAt);
    expect(Object.keys(row)).toHaveLength(ALL_FIELDS.length + 1);
    expect(row.first_name).toBe('Jane');
    expect(row.last_name).toBeNull();
    expect(row.summary).toBeNull();
    expect(row.processed_at).toBe('2024-06-15T12:00:00.000Z');
  });
});

describe('PersistenceWriter', () => {
  it('updates an existing record and keeps earlier values for unknown fields', async () => {
    const store = new InMemoryCandidateStore();
    store.seed(5, 'resume text', readyAt, { last_name: 'Doe' });
    const writer = createWriter(store);

    const outcome = await writer.write(5, ParsedFieldSet.from({ firstName: 'Jane', lastName: 'NULL' }), processedAt);

    expect(outcome).toEqual({ ok: true, mode: 'update', message: 'Updated record 5' });
    expect(store.rows.get(5)?.first_name).toBe('Jane');
    expect(store.rows.get(5)?.last_name).toBe('Doe');
    expect(store.rows.get(5)?.processed_at).toBe('2024-06-15T12:00:00.000Z');
  });

  it('produces the same row when the same fields are written twice', async () => {
    const store = new InMemoryCandidateStore();
    store.seed(5, 'resume text', readyAt);
    const writer = createWriter(store);
    const fields = ParsedFieldSet.from({ firstName: 'Jane', city: 'Austin' });

    await writer.write(5, fields, processedAt);
    const once = { ...store.rows.get(5) };
    await writer.write(5, fields, processedAt);

    expect(store.rows.get(5)).toEqual(once);
  });

  it('inserts a record that does not exist yet', async () => {
    const store = new InMemoryCandidateStore();
    const writer = createWriter(store);

    const outcome = await writer.write(9, ParsedFieldSet.from({ email: 'jane@example.com' }), processedAt);

    expect(outcome).toEqual({ ok: true, mode: 'insert', message: 'Inserted record 9' });
    expect(store.rows.get(9)?.email).toBe('jane@example.com');
    expect(store.rows.get(9)?.first_name).toBeNull();
    expect(store.rows.get(9)?.id).toBe('9');
  });

  it('retries after a deadlock', async () => {
    const store = new InMemoryCandidateStore();
    store.seed(5, 'resume text', readyAt);
    store.failNext('update', new StoreError('update failed: deadlock detected', 'deadlock'));
    const writer = createWriter(store);

    const outcome = await writer.write(5, ParsedFieldSet.from({ firstName: 'Jane' }), processedAt);

    expect(outcome.ok).toBe(true);
    expect(store.calls.map((call) => call.operation)).toEqual(['exists', 'update', 'exists', 'update']);
    expect(store.rows.get(5)?.first_name).toBe('Jane');
  });

  it('fails at once on a non-transient error and never throws', async () => {
    const store = new InMemoryCandidateStore();
    store.failNext('insert', new StoreError('insert failed: column "x" does not exist', 'syntax', '42703'));
    const writer = createWriter(store);

    const outcome = await writer.write(9, ParsedFieldSet.from({ firstName: 'Jane' }), processedAt);

    expect(outcome).toEqual({ ok: false, message: 'insert failed: column "x" does not exist' });
    expect(store.calls.filter((call) => call.operation === 'insert')).toHaveLength(1);
  });

  it('gives up after the last attempt', async () => {
    const store = new InMemoryCandidateStore();
    for (let i = 0; i < 3; i++) {
      store.failNext('exists', new StoreError('exists failed: fetch failed', 'network'));
    }
    const writer = createWriter(store);

    const outcome = await writer.write(5, ParsedFieldSet.from({ firstName: 'Jane' }), processedAt);

    expect(outcome).toEqual({ ok: false, message: 'exists failed: fetch failed' });
    expect(store.calls).toHaveLength(3);
  });
});
