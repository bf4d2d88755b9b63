/**
 * Promise memoization shared by the caches
 */

/**
 * Return the pending or settled work stored under key, or start it.
 * The promise is published before the work runs, so concurrent first
 * callers share one invocation and a rejection stays memoized.
 */
export function getOrCreate<T>(map: Map<string, Promise<T>>, key: string, create: () => Promise<T>): Promise<T> {
  const existing = map.get(key);
  if (existing) {
    return existing;
  }
  const pending = Promise.resolve().then(create);
  map.set(key, pending);
  return pending;
}
