import { createHash } from 'node:crypto';

interface CacheEntry<T> {
  content: T;
  createdAt: number;
  accessCount: number;
  ttlMs: number;
}

export interface CacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  /** hits / (hits + misses); 0 before the first lookup */
  hitRate: number;
  totalRequests: number;
}

export interface CacheStoreOptions {
  maxSize?: number;
  defaultTtlMs?: number;
  /** Clock in epoch milliseconds; injectable for tests */
  now?: () => number;
}

const DEFAULT_MAX_SIZE = 100;
const DEFAULT_TTL_MS = 60 * 60 * 1000;

/**
 * In-memory cache with a size bound and per-entry time-to-live.
 *
 * Entries live in a Map, whose iteration order is the eviction order: a hit
 * re-inserts the entry at the recent end, and inserting a new key at capacity
 * drops the entry at the old end. Expiry is lazy; `get` discards an elapsed
 * entry and counts a miss. `cleanupExpired` sweeps eagerly when asked.
 *
 * All operations are synchronous, so concurrent sessions sharing one store
 * cannot interleave inside an operation.
 */
export class CacheStore<T> {
  #entries = new Map<string, CacheEntry<T>>();
  #maxSize: number;
  #defaultTtlMs: number;
  #now: () => number;
  #hits = 0;
  #misses = 0;

  constructor(options: CacheStoreOptions = {}) {
    this.#maxSize = options.maxSize ?? DEFAULT_MAX_SIZE;
    this.#defaultTtlMs = options.defaultTtlMs ?? DEFAULT_TTL_MS;
    this.#now = options.now ?? Date.now;

    if (!Number.isInteger(this.#maxSize) || this.#maxSize < 1) {
      throw new RangeError(`maxSize must be a positive integer, got ${this.#maxSize}`);
    }
  }

  get size(): number {
    return this.#entries.size;
  }

  get(key: string): T | undefined {
    const entry = this.#entries.get(key);
    if (!entry) {
      this.#misses++;
      return undefined;
    }

    if (this.#isExpired(entry)) {
      this.#entries.delete(key);
      this.#misses++;
      return undefined;
    }

    this.#entries.delete(key);
    this.#entries.set(key, entry);
    entry.accessCount++;
    this.#hits++;
    return entry.content;
  }

  set(key: string, content: T, ttlMs: number = this.#defaultTtlMs): void {
    if (this.#entries.has(key)) {
      this.#entries.delete(key);
    } else if (this.#entries.size >= this.#maxSize) {
      const oldest = this.#entries.keys().next();
      if (!oldest.done) this.#entries.delete(oldest.value);
    }

    this.#entries.set(key, {
      content,
      createdAt: this.#now(),
      accessCount: 0,
      ttlMs,
    });
  }

  /**
   * Cached value, or the result of `compute` stored under `key`.
   *
   * Not deduplicated: callers racing on one key may each compute, and the
   * last `set` wins. Content under one key is interchangeable, so that is fine.
   */
  async getOrCompute(key: string, compute: () => T | Promise<T>, ttlMs?: number): Promise<T> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const value = await compute();
    this.set(key, value, ttlMs);
    return value;
  }

  invalidate(key: string): boolean {
    return this.#entries.delete(key);
  }

  /** Removes every entry whose key matches; returns how many went. */
  invalidateWhere(predicate: (key: string) => boolean): number {
    let removed = 0;
    for (const key of [...this.#entries.keys()]) {
      if (predicate(key)) {
        this.#entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /** Drops all entries and resets hit/miss counters. */
  clear(): void {
    this.#entries.clear();
    this.#hits = 0;
    this.#misses = 0;
  }

  cleanupExpired(): number {
    let removed = 0;
    for (const [key, entry] of [...this.#entries]) {
      if (this.#isExpired(entry)) {
        this.#entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  stats(): CacheStats {
    const totalRequests = this.#hits + this.#misses;
    return {
      size: this.#entries.size,
      maxSize: this.#maxSize,
      hits: this.#hits,
      misses: this.#misses,
      hitRate: totalRequests > 0 ? this.#hits / totalRequests : 0,
      totalRequests,
    };
  }

  #isExpired(entry: CacheEntry<T>): boolean {
    return this.#now() > entry.createdAt + entry.ttlMs;
  }
}

/**
 * Stable key from semantically meaningful parts, e.g.
 * `deriveCacheKey('intro', characterName, victimName)`.
 */
export function deriveCacheKey(namespace: string, ...parts: readonly string[]): string {
  const digest = createHash('sha256').update(JSON.stringify(parts)).digest('hex');
  return `${namespace}:${digest}`;
}
