/**
 * Maps `items` through `fn` with at most `concurrency` calls in flight. Results keep input order
 * whatever the completion order. Once `signal` is aborted no further item is started and the
 * returned promise rejects with its reason.
 */
export async function mapWithConcurrency<T, R>(params: {
  items: readonly T[];
  concurrency: number;
  fn: (item: T, index: number) => Promise<R>;
  signal?: AbortSignal;
}): Promise<R[]> {
  const { items, fn, signal } = params;
  const concurrency = Math.max(1, Math.floor(params.concurrency || 1));
  signal?.throwIfAborted();
  if (items.length === 0) return [];

  const out: R[] = new Array<R>(items.length);
  let nextIndex = 0;

  const workerCount = Math.min(concurrency, items.length);
  const workers = Array.from({ length: workerCount }, async () => {
    while (true) {
      signal?.throwIfAborted();
      const i = nextIndex;
      if (i >= items.length) return;
      nextIndex += 1;
      out[i] = await fn(items[i], i);
    }
  });

  await Promise.all(workers);
  return out;
}
