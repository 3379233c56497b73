/**
 * Keyed cache that computes each key at most once. Concurrent requests for an
 * uncached key share the first caller's pending computation; a failed computation
 * is evicted so a later request can try again.
 */
export class SingleFlightCache<T> {
  private readonly entries = new Map<string, Promise<T>>();

  get size() {
    return this.entries.size;
  }

  has(key: string) {
    return this.entries.has(key);
  }

  getOrCompute(key: string, compute: () => Promise<T>): Promise<T> {
    const existing = this.entries.get(key);
    if (existing) return existing;
    const pending = compute();
    this.entries.set(key, pending);
    void pending.catch(() => {
      if (this.entries.get(key) === pending) this.entries.delete(key);
    });
    return pending;
  }
}
