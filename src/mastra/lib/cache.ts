// ============================================================================
// TTL CACHE
// ============================================================================
// Time-boxed memoization for quote fetches, market summaries and advice.
// Entries are keyed by (operation name, input symbol set) and dropped either
// when they expire or when invalidate() is called after an execution batch.
// ============================================================================

interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

export interface Invalidatable {
  invalidate(): void;
}

export class TtlCache<T> implements Invalidatable {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Build a cache key that ignores symbol order and duplicates.
   */
  static key(operation: string, symbols: Iterable<string>): string {
    const unique = Array.from(new Set(symbols)).sort();
    return `${operation}:${unique.join(',')}`;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value, storedAt: this.now() });
  }

  async getOrCompute(key: string, compute: () => Promise<T>): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const value = await compute();
    this.set(key, value);
    return value;
  }

  invalidate(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
