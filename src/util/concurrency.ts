/**
 * Run `fn` over `items` with at most `limit` calls in flight. Results keep the
 * order of `items`, not completion order. A rejection from `fn` rejects the
 * whole call; callers that need per-item isolation catch inside `fn`.
 */
export async function mapLimit<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const out = new Array<R>(items.length);
  let next = 0;

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (next < items.length) {
      const index = next++;
      out[index] = await fn(items[index], index);
    }
  });

  await Promise.all(workers);
  return out;
}
