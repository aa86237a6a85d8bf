import type { CachedResponse } from '../types/engine';

export interface ResponseCacheOptions {
  capacity?: number;
  /** Entries older than this are treated as misses. null keeps entries until evicted. */
  ttlMs?: number | null;
  now?: () => number;
}

export interface ResponseCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
}

/** Cache key for an utterance: lowercased, trimmed, whitespace collapsed. */
export function fingerprint(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

/**
 * Bounded reply cache with least-recently-used eviction. A Map keeps
 * insertion order, so the first key is always the least recently used.
 */
export class ResponseCache {
  private entries: Map<string, CachedResponse> = new Map();
  private maxEntries: number;
  private readonly ttlMs: number | null;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: ResponseCacheOptions = {}) {
    const capacity = options.capacity ?? 50;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`ResponseCache capacity must be a positive integer, got ${capacity}`);
    }
    this.maxEntries = capacity;
    this.ttlMs = options.ttlMs ?? null;
    this.now = options.now ?? Date.now;
  }

  get capacity(): number {
    return this.maxEntries;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): CachedResponse | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    // Move to the most-recently-used end
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry;
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !this.isExpired(entry);
  }

  set(key: string, reply: string) {
    this.entries.delete(key);
    this.entries.set(key, Object.freeze({ reply, createdAt: this.now() }));
    this.evictOverflow();
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  purgeExpired(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  setCapacity(capacity: number) {
    this.maxEntries = Math.max(1, Math.floor(capacity));
    this.evictOverflow();
  }

  clear() {
    this.entries.clear();
  }

  stats(): ResponseCacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      capacity: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  private isExpired(entry: CachedResponse): boolean {
    return this.ttlMs !== null && this.now() - entry.createdAt >= this.ttlMs;
  }

  private evictOverflow() {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
    }
  }
}
