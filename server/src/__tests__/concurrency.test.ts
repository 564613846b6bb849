import { describe, it, expect } from 'vitest';
import { createConcurrencyLimiter, mapSettled } from '../lib/concurrency.js';

describe('createConcurrencyLimiter', () => {
  it('never runs more than the limit at once', async () => {
    const limit = createConcurrencyLimiter(2);
    let active = 0;
    let peak = 0;
    const task = async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 2));
      active -= 1;
    };

    await Promise.all([1, 2, 3, 4, 5].map(() => limit(task)));

    expect(peak).toBe(2);
  });
});

describe('mapSettled', () => {
  it('keeps input order and captures rejections per item', async () => {
    const outcomes = await mapSettled([1, 2, 3], 2, async (n) => {
      if (n === 2) throw new Error('two failed');
      return n * 10;
    });

    expect(outcomes).toEqual([
      { ok: true, value: 10 },
      { ok: false, error: new Error('two failed') },
      { ok: true, value: 30 },
    ]);
  });
});
