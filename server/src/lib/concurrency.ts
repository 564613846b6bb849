/**
 * Bounded worker pool. At most `limit` tasks run at once; the rest wait in
 * FIFO order.
 */
export function createConcurrencyLimiter(limit: number) {
  const max = Math.max(1, Math.floor(limit));
  let active = 0;
  const queue: Array<() => void> = [];

  const release = () => {
    active = Math.max(0, active - 1);
    const next = queue.shift();
    if (next) next();
  };

  return async function runLimited<T>(task: () => Promise<T>): Promise<T> {
    if (active >= max) {
      await new Promise<void>((resolve) => queue.push(resolve));
    }
    active += 1;
    try {
      return await task();
    } finally {
      release();
    }
  };
}

/**
 * Runs `fn` over every item with bounded concurrency and returns the settled
 * outcomes in input order. Rejections are captured per item, never thrown.
 */
export async function mapSettled<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<Array<{ ok: true; value: R } | { ok: false; error: unknown }>> {
  const run = createConcurrencyLimiter(limit);
  return Promise.all(
    items.map((item, index) =>
      run(() => fn(item, index))
        .then((value) => ({ ok: true as const, value }))
        .catch((error: unknown) => ({ ok: false as const, error })),
    ),
  );
}
