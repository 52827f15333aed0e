/**
 * Generated value cache keyed by schema fingerprint.
 * Entries expire after a TTL (seconds).
 */

export type Clock = () => number;

export interface GenerationCacheOptions {
  /** Time to live in seconds */
  ttl: number;
  /** Milliseconds since the epoch */
  clock?: Clock;
}

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  expired: number;
}

interface Entry<Value> {
  value: Value;
  expiresAt: number;
}

export class GenerationCache<Value> {
  private readonly entries = new Map<string, Entry<Value>>();
  private readonly ttlMs: number;
  private readonly clock: Clock;
  private hits = 0;
  private misses = 0;
  private expired = 0;

  constructor(options: GenerationCacheOptions) {
    this.ttlMs = options.ttl * 1000;
    this.clock = options.clock ?? Date.now;
  }

  getCachedValue(key: string): Value | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      this.expired++;
      this.misses++;
      return undefined;
    }
    this.hits++;
    return entry.value;
  }

  set(key: string, value: Value): void {
    this.entries.set(key, { value, expiresAt: this.clock() + this.ttlMs });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      expired: this.expired,
    };
  }
}
