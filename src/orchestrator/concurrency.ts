// ---------------------------------------------------------------------------
// Concurrency helpers wrapping p-limit.
// ---------------------------------------------------------------------------

import pLimit from "p-limit";

/** Split an array into consecutive chunks of at most `size` items. */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Run `fn` over every item with at most `maxConcurrency` calls in flight,
 * and wait for all of them to settle.
 *
 * Results come back in input order regardless of completion order. A
 * rejected call does not cancel the others.
 */
export function settleAll<T, R>(
  items: readonly T[],
  maxConcurrency: number,
  fn: (item: T) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const limit = pLimit(maxConcurrency);
  return Promise.allSettled(items.map((item) => limit(() => fn(item))));
}
