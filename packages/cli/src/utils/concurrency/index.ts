// pattern: Imperative Shell

/**
 * Run `worker` over `items` with at most `limit` calls in flight, and
 * resolve with the results in input order once every call has settled.
 *
 * Unlike fixed batches, a slot is refilled as soon as any call finishes,
 * so one slow item only holds up its own slot. A rejected call rejects
 * the whole map; callers that want per-item failures resolve them as
 * values instead.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const results = new Array<R>(items.length);
  // Shared by every slot, so each item is taken exactly once
  const pending = items.entries();

  async function runSlot(): Promise<void> {
    for (const [index, item] of pending) {
      results[index] = await worker(item, index);
    }
  }

  const slots = Array.from({ length: Math.min(limit, items.length) }, () => runSlot());
  await Promise.all(slots);
  return results;
}
