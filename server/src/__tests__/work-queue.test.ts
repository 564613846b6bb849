import { describe, it, expect } from 'vitest';
import { claimRecords, selectWork } from '../pipeline/work-queue.js';
import { StoreError } from '../store/db-errors.js';
import { createTestContext } from './helpers/context.js';
import { InMemoryCandidateStore } from './helpers/in-memory-store.js';

const selectOptions = { windowDays: 30, batchSize: 2 };
const claimOptions = { workers: 1, baseDelayMs: 1 };

function day(date: string): Date {
  return new Date(`${date}T00:00:00Z`);
}

describe('selectWork', () => {
  it('returns the most recently ready records inside the window', async () => {
    const store = new InMemoryCandidateStore();
    store.seed(1, 'resume one', day('2024-06-10'));
    store.seed(2, 'resume two', day('2024-06-14'));
    store.seed(3, 'resume three', day('2024-06-12'));
    store.seed(4, 'old resume', day('2024-01-01'));
    store.seed(5, 'done', day('2024-06-15'), { processed_at: '2024-06-15T01:00:00Z' });

    const work = await selectWork(store, createTestContext(), selectOptions);

    expect(work).toEqual([
      { id: 2, rawText: 'resume two' },
      { id: 3, rawText: 'resume three' },
    ]);
  });

  it('skips blank records for the rest of the run', async () => {
    const store = new InMemoryCandidateStore();
    store.seed(1, '   ', day('2024-06-14'));
    store.seed(2, ' resume two ', day('2024-06-10'));
    const ctx = createTestContext();

    expect(await selectWork(store, ctx, selectOptions)).toEqual([{ id: 2, rawText: 'resume two' }]);
    expect([...ctx.skippedIds]).toEqual([1]);

    expect(await selectWork(store, ctx, selectOptions)).toEqual([{ id: 2, rawText: 'resume two' }]);
    expect(store.calls.filter((call) => call.operation === 'selectClaimable')).toHaveLength(2);
  });

  it('clears the skipped ids once nothing is claimable', async () => {
    const ctx = createTestContext();
    ctx.skippedIds.add(99);

    expect(await selectWork(new InMemoryCandidateStore(), ctx, selectOptions)).toEqual([]);
    expect(ctx.skippedIds.size).toBe(0);
  });

  it('returns nothing when the store cannot be read', async () => {
    const store = new InMemoryCandidateStore();
    store.seed(1, 'resume one', day('2024-06-14'));
    store.failNext('selectClaimable', new StoreError('selectClaimable failed: fetch failed', 'network'));

    expect(await selectWork(store, createTestContext(), selectOptions)).toEqual([]);
  });
});

describe('claimRecords', () => {
  it('claimed records are never selected again', async () => {
    const store = new InMemoryCandidateStore();
    store.seed(1, 'resume one', day('2024-06-10'));
    store.seed(2, 'resume two', day('2024-06-14'));
    const ctx = createTestContext();

    const work = await selectWork(store, ctx, selectOptions);
    const outcome = await claimRecords(store, ctx, work, claimOptions);

    expect(outcome.claimed.map((record) => record.id)).toEqual([2, 1]);
    expect(store.rows.get(1)?.claimed_at).toBe('2024-06-15T12:00:00.000Z');
    expect(await selectWork(store, ctx, selectOptions)).toEqual([]);
  });

  it('drops a record another run claimed first', async () => {
    const store = new InMemoryCandidateStore();
    store.seed(1, 'resume one', day('2024-06-10'));
    store.seed(2, 'resume two', day('2024-06-14'));
    const ours = createTestContext();
    const theirs = createTestContext();

    const work = await selectWork(store, ours, selectOptions);
    await claimRecords(store, theirs, [{ id: 2, rawText: 'resume two' }], claimOptions);
    const outcome = await claimRecords(store, ours, work, claimOptions);

    expect(outcome).toEqual({ claimed: [{ id: 1, rawText: 'resume one' }], lost: [2], failed: [] });
  });

  it('retries a deadlocked claim and reports hard failures per record', async () => {
    const store = new InMemoryCandidateStore();
    store.seed(1, 'resume one', day('2024-06-10'));
    store.seed(2, 'resume two', day('2024-06-14'));
    store.failNext('claim', new StoreError('claim failed: deadlock detected', 'deadlock'));
    store.failNext('claim', new StoreError('claim failed: permission denied', 'auth'));
    const ctx = createTestContext();

    const outcome = await claimRecords(store, ctx, [
      { id: 1, rawText: 'resume one' },
      { id: 2, rawText: 'resume two' },
    ], claimOptions);

    // Record 1 hits the deadlock and then the auth error; record 2 claims normally.
    expect(outcome).toEqual({ claimed: [{ id: 2, rawText: 'resume two' }], lost: [], failed: [1] });
  });
});
