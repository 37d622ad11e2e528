/**
 * Maps `items` through `fn` with at most `limit` calls in flight. Results keep
 * the input order. The first rejection stops new work from starting and is
 * rethrown once the calls already running have settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const state: { next: number; failure?: { error: unknown } } = { next: 0 };

  async function worker(): Promise<void> {
    while (!state.failure && state.next < items.length) {
      const index = state.next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        state.failure ??= { error };
      }
    }
  }

  const width = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: width }, () => worker()));
  if (state.failure) throw state.failure.error;
  return results;
}
