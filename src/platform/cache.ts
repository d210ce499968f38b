// ──────────────────────────────────────────
// Platform: time-boxed memo
// ──────────────────────────────────────────

type Entry<V> = {
  value: V;
  ts: number;
};

/**
 * Keeps each loaded value for `ttlMs`. A TTL of 0 turns the cache off.
 * Failed loads are not stored.
 */
export class TtlCache<V> {
  private entries = new Map<string, Entry<V>>();

  constructor(
    private ttlMs: number,
    private now: () => number = Date.now
  ) {}

  async getOrLoad(key: string, load: () => Promise<V>): Promise<V> {
    const existing = this.entries.get(key);
    if (existing && !this.isExpired(existing)) return existing.value;

    const value = await load();
    if (this.ttlMs > 0) {
      this.prune();
      this.entries.set(key, { value, ts: this.now() });
    }
    return value;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private isExpired(entry: Entry<V>): boolean {
    return this.now() - entry.ts >= this.ttlMs;
  }

  private prune(): void {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) this.entries.delete(key);
    }
  }
}
