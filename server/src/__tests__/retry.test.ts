import { describe, it, expect, vi } from 'vitest';
import { isTransientError, withRetry } from '../lib/retry.js';
import { StoreError, isRetryableStoreError } from '../store/db-errors.js';

describe('withRetry', () => {
  it('retries transient HTTP status errors', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 3) {
        const err = new Error('temporary outage') as Error & { status?: number };
        err.status = 503;
        throw err;
      }
      return 'ok';
    }, { maxAttempts: 3, baseDelay: 1 });

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('retries transient network error codes', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 2) {
        const err = new Error('socket closed') as Error & { code?: string };
        err.code = 'ECONNRESET';
        throw err;
      }
      return 42;
    }, { maxAttempts: 2, baseDelay: 1 });

    expect(result).toBe(42);
    expect(attempts).toBe(2);
  });

  it('uses Retry-After header from response metadata', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts === 1) {
        const err = new Error('rate limited') as Error & {
          response?: { status: number; headers: Headers };
        };
        err.response = {
          status: 429,
          headers: new Headers([['retry-after', '0.001']]),
        };
        throw err;
      }
      return 'done';
    }, { maxAttempts: 2, baseDelay: 1 });

    expect(result).toBe('done');
    expect(attempts).toBe(2);
  });

  it('does not retry non-transient errors', async () => {
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new Error('validation failed');
    }, { maxAttempts: 3, baseDelay: 1 })).rejects.toThrow('validation failed');
    expect(attempts).toBe(1);
  });

  it('does not retry an aborted operation', async () => {
    const onRetry = vi.fn();
    const abortError = new Error('The operation was aborted');
    abortError.name = 'AbortError';

    await expect(withRetry(async () => {
      throw abortError;
    }, { maxAttempts: 3, baseDelay: 1, onRetry })).rejects.toThrow('The operation was aborted');
    expect(onRetry).not.toHaveBeenCalled();
  });

  it('stops after maxAttempts and rethrows the last error', async () => {
    const onRetry = vi.fn();
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new Error(`overloaded ${attempts}`);
    }, { maxAttempts: 3, baseDelay: 1, onRetry })).rejects.toThrow('overloaded 3');
    expect(attempts).toBe(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.any(Error));
  });
});

describe('withRetry with a custom retry predicate', () => {
  it('retries deadlocks under the store predicate', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts === 1) throw new StoreError('update failed: deadlock detected', 'deadlock', '40P01');
      return 'written';
    }, { maxAttempts: 3, baseDelay: 1, isRetryable: (_error, raw) => isRetryableStoreError(raw) });

    expect(result).toBe('written');
    expect(attempts).toBe(2);
  });

  it('fails fast on a syntax error under the store predicate', async () => {
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new StoreError('update failed: column "nope" does not exist', 'syntax', '42703');
    }, { maxAttempts: 3, baseDelay: 1, isRetryable: (_error, raw) => isRetryableStoreError(raw) }))
      .rejects.toThrow('column "nope" does not exist');
    expect(attempts).toBe(1);
  });

  it('ignores the default HTTP heuristics when a predicate is given', async () => {
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new Error('503 service unavailable');
    }, { maxAttempts: 3, baseDelay: 1, isRetryable: () => false })).rejects.toThrow('503');
    expect(attempts).toBe(1);
  });
});

describe('isTransientError', () => {
  it('recognises status codes embedded in messages', () => {
    expect(isTransientError(new Error('Request failed with status 429'))).toBe(true);
    expect(isTransientError(new Error('Request failed with status 400'))).toBe(false);
  });
});
