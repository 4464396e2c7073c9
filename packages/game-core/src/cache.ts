// packages/game-core/src/cache.ts
//
// Memo caches for the solvers. They are plain objects handed to a solver,
// never module state: sessions that should share results share an instance,
// and tests start from an empty one.
//
// Keys always begin with the universe key ("4x6") so configurations cannot
// collide inside one cache. A cache holds at most `limit` entries; storing
// past that evicts the oldest one.

export class MemoCache<V> {
  private readonly entries = new Map<string, { value: V }>();
  hits = 0;
  misses = 0;

  constructor(readonly limit = Infinity) {
    if (!(limit >= 1)) {
      throw new RangeError(`Cache limit must be at least 1, got ${limit}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /** Returns the cached value, computing and storing it on a miss. */
  resolve(key: string, compute: () => V): V {
    const hit = this.entries.get(key);
    if (hit) {
      this.hits++;
      return hit.value;
    }
    this.misses++;
    const value = compute();
    if (this.entries.size >= this.limit) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, { value });
    return value;
  }
}

/** Knuth choices: universe index of the best guess per candidate set. */
export class GuessCache extends MemoCache<number> {}

/** IDDFS results: winning guess index per (candidates, depth), or null. */
export class SolveCache extends MemoCache<number | null> {}
