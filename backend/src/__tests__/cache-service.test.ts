import { describe, it, expect, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { CacheService, hashFilters, locationsKey, viewsKey } from '../services/cache-service.ts';

const Numbers = z.array(z.number());
const parseNumbers = (v: unknown) => Numbers.parse(v);

describe('CacheService (memory)', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('round-trips values through the parse function', async () => {
    const cache = new CacheService();
    await cache.set('views:v1:a', [1, 2, 3], 60);
    expect(await cache.get('views:v1:a', parseNumbers)).toEqual([1, 2, 3]);
    expect(cache.backend).toBe('memory');
  });

  it('misses on unknown keys and on values that no longer parse', async () => {
    const cache = new CacheService();
    await cache.set('views:v1:a', { not: 'numbers' }, 60);
    expect(await cache.get('missing', parseNumbers)).toBeNull();
    expect(await cache.get('views:v1:a', parseNumbers)).toBeNull();
  });

  it('expires entries after their TTL', async () => {
    vi.useFakeTimers();
    const cache = new CacheService();
    await cache.set('k', [1], 10);
    vi.advanceTimersByTime(9_000);
    expect(await cache.get('k', parseNumbers)).toEqual([1]);
    vi.advanceTimersByTime(2_000);
    expect(await cache.get('k', parseNumbers)).toBeNull();
  });

  it('evicts the oldest entry when full', async () => {
    const cache = new CacheService();
    for (let i = 0; i <= 200; i++) await cache.set(`k${i}`, [i], 60);
    expect(await cache.get('k0', parseNumbers)).toBeNull();
    expect(await cache.get('k200', parseNumbers)).toEqual([200]);
    expect(await cache.getStats()).toEqual({ type: 'memory', keys: 200 });
  });

  it('invalidates computed views and locations only', async () => {
    const cache = new CacheService();
    await cache.set('views:v1:abc', [1], 60);
    await cache.set('views:v2:def', [2], 60);
    await cache.set('locations:v1', [3], 60);
    await cache.set('other', [4], 60);

    expect(await cache.invalidateViews()).toBe(3);
    expect(await cache.get('other', parseNumbers)).toEqual([4]);
    expect(await cache.getStats()).toEqual({ type: 'memory', keys: 1 });
  });

  it('treats only * as a wildcard in patterns', async () => {
    const cache = new CacheService();
    await cache.set('views.v1', [1], 60);
    await cache.set('viewsXv1', [2], 60);
    expect(await cache.invalidatePattern('views.*')).toBe(1);
    expect(await cache.get('viewsXv1', parseNumbers)).toEqual([2]);
  });
});

describe('cache keys', () => {
  it('hashes parameters independently of key order', () => {
    expect(hashFilters({ region: '11', bins: 20 })).toBe(hashFilters({ bins: 20, region: '11' }));
    expect(hashFilters({ region: '11' })).not.toBe(hashFilters({ region: '93' }));
    expect(hashFilters({})).toHaveLength(12);
  });

  it('carries the table version', () => {
    expect(viewsKey(3, { region: '11' })).toMatch(/^views:v3:[0-9a-f]{12}$/);
    expect(viewsKey(3, { region: '11' })).not.toBe(viewsKey(4, { region: '11' }));
    expect(locationsKey(7)).toBe('locations:v7');
  });
});
