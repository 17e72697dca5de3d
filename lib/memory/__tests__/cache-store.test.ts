import { describe, expect, it, vi } from 'vitest';

import { CacheStore, deriveCacheKey } from '../cache-store';

function clock(start = 1_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('CacheStore', () => {
  it('returns what was set until the entry expires', () => {
    const time = clock();
    const store = new CacheStore<string>({ defaultTtlMs: 100, now: time.now });

    store.set('k', 'v');
    time.advance(100);
    expect(store.get('k')).toBe('v');

    time.advance(1);
    expect(store.get('k')).toBeUndefined();
    expect(store.size).toBe(0);
  });

  it('treats ttl 0 as expired on the next tick', () => {
    const time = clock();
    const store = new CacheStore<string>({ now: time.now });

    store.set('k', 'v', 0);
    expect(store.get('k')).toBe('v');

    time.advance(1);
    expect(store.get('k')).toBeUndefined();
  });

  it('counts an expired lookup as a miss', () => {
    const time = clock();
    const store = new CacheStore<string>({ defaultTtlMs: 10, now: time.now });

    store.set('k', 'v');
    time.advance(11);
    store.get('k');

    expect(store.stats()).toEqual({ size: 0, maxSize: 100, hits: 0, misses: 1, hitRate: 0, totalRequests: 1 });
  });

  it('evicts the least recently used entry when a new key arrives at capacity', () => {
    const store = new CacheStore<number>({ maxSize: 2 });

    store.set('a', 1);
    store.set('b', 2);
    store.get('a');
    store.set('c', 3);

    expect(store.size).toBe(2);
    expect(store.get('b')).toBeUndefined();
    expect(store.get('a')).toBe(1);
    expect(store.get('c')).toBe(3);
  });

  it('overwrites an existing key without evicting', () => {
    const store = new CacheStore<number>({ maxSize: 2 });

    store.set('a', 1);
    store.set('b', 2);
    store.set('a', 10);

    expect(store.size).toBe(2);
    expect(store.get('a')).toBe(10);
    expect(store.get('b')).toBe(2);
  });

  it('never grows past maxSize', () => {
    const store = new CacheStore<number>({ maxSize: 3 });
    for (let i = 0; i < 10; i++) store.set(`key-${i}`, i);

    expect(store.size).toBe(3);
    expect(store.get('key-9')).toBe(9);
    expect(store.get('key-6')).toBeUndefined();
  });

  it('reports hits, misses and hit rate', () => {
    const store = new CacheStore<string>({ maxSize: 5 });
    store.set('a', 'x');

    store.get('a');
    store.get('a');
    store.get('a');
    store.get('missing');

    expect(store.stats()).toEqual({ size: 1, maxSize: 5, hits: 3, misses: 1, hitRate: 0.75, totalRequests: 4 });
  });

  it('computes once and then serves from the cache', async () => {
    const store = new CacheStore<string>();
    const compute = vi.fn(async () => 'generated');

    expect(await store.getOrCompute('k', compute)).toBe('generated');
    expect(await store.getOrCompute('k', compute)).toBe('generated');
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('does not cache a failed computation', async () => {
    const store = new CacheStore<string>();

    await expect(store.getOrCompute('k', async () => {
      throw new Error('backend down');
    })).rejects.toThrow('backend down');
    expect(store.size).toBe(0);
  });

  it('invalidates single keys and keys matching a predicate', () => {
    const store = new CacheStore<number>();
    store.set('intro:Ada|Bo', 1);
    store.set('intro:Ada|Cy', 2);
    store.set('intro:Dee|Bo', 3);

    expect(store.invalidate('intro:Dee|Bo')).toBe(true);
    expect(store.invalidate('intro:Dee|Bo')).toBe(false);
    expect(store.invalidateWhere((key) => key.startsWith('intro:Ada|'))).toBe(2);
    expect(store.size).toBe(0);
  });

  it('sweeps expired entries on demand', () => {
    const time = clock();
    const store = new CacheStore<number>({ now: time.now });
    store.set('short', 1, 5);
    store.set('long', 2, 500);

    time.advance(10);

    expect(store.cleanupExpired()).toBe(1);
    expect(store.size).toBe(1);
    expect(store.get('long')).toBe(2);
  });

  it('clear empties the store and resets counters', () => {
    const store = new CacheStore<number>();
    store.set('a', 1);
    store.get('a');
    store.get('b');

    store.clear();

    expect(store.stats()).toEqual({ size: 0, maxSize: 100, hits: 0, misses: 0, hitRate: 0, totalRequests: 0 });
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new CacheStore({ maxSize: 0 })).toThrow(RangeError);
  });
});

describe('deriveCacheKey', () => {
  it('is stable for the same parts and differs when any part changes', () => {
    expect(deriveCacheKey('narration', 'harbor', 'Bo')).toBe(deriveCacheKey('narration', 'harbor', 'Bo'));
    expect(deriveCacheKey('narration', 'harbor', 'Bo')).not.toBe(deriveCacheKey('narration', 'harbor', 'Cy'));
  });

  it('keeps part boundaries apart', () => {
    expect(deriveCacheKey('n', 'ab', 'c')).not.toBe(deriveCacheKey('n', 'a', 'bc'));
  });

  it('prefixes the namespace', () => {
    expect(deriveCacheKey('narration', 'x')).toMatch(/^narration:[0-9a-f]{64}$/);
  });
});
