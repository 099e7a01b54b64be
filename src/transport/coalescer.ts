/**
 * Request coalescing
 *
 * Concurrent callers asking for the same key share one in-flight promise.
 * The entry is removed as soon as the promise settles, so results are never
 * reused after the fact (that is the cache's job).
 */

export class RequestCoalescer<T> {
  private inFlight = new Map<string, Promise<T>>();
  private hits = 0;
  private misses = 0;

  run(key: string, task: () => Promise<T>): Promise<T> {
    const existing = this.inFlight.get(key);
    if (existing) {
      this.hits++;
      return existing;
    }

    this.misses++;
    const promise = task().finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, promise);
    return promise;
  }

  get pendingCount(): number {
    return this.inFlight.size;
  }

  getStats(): { coalesced: number; executed: number; pending: number } {
    return { coalesced: this.hits, executed: this.misses, pending: this.inFlight.size };
  }
}
