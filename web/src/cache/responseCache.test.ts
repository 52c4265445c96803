import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ResponseCache } from './ResponseCache';
import { CACHE_BACKUP_KEY } from './schema';
import { MemoryStorage } from '../client/storage';

const T0 = new Date('2026-01-27T10:00:00Z').getTime();

describe('ResponseCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return entries until the TTL has elapsed', () => {
    const cache = new ResponseCache({ ttlMs: 300000 });
    cache.set('k', { value: 1 });

    vi.setSystemTime(T0 + 299999);
    expect(cache.get('k')).toEqual({ value: 1 });

    vi.setSystemTime(T0 + 300001);
    expect(cache.get('k')).toBeUndefined();
    expect(cache.keys()).toEqual([]);
  });

  it('should overwrite unconditionally and keep the etag', () => {
    const cache = new ResponseCache();
    cache.set('k', 'first', '"v1"');
    cache.set('k', 'second', '"v2"');
    expect(cache.getEntry('k')?.data).toBe('second');
    expect(cache.getEntry('k')?.etag).toBe('"v2"');
  });

  it('should invalidate by substring', () => {
    const cache = new ResponseCache();
    cache.set('/api/v1/feedback?page=1', 1);
    cache.set('/api/v1/feedback/f1?', 2);
    cache.set('/api/v1/members?', 3);

    expect(cache.invalidate('/api/v1/feedback?')).toBe(1);
    expect(cache.keys()).toEqual(['/api/v1/feedback/f1?', '/api/v1/members?']);

    expect(cache.invalidate()).toBe(2);
    expect(cache.keys()).toEqual([]);
    expect(cache.getUsage()).toBe(0);
  });

  it('should evict oldest entries down to 80% of the quota', () => {
    // each '"xxxx"' payload weighs 6 bytes
    const cache = new ResponseCache({ maxBytes: 16 });
    cache.set('a', 'xxxx');
    vi.setSystemTime(T0 + 1);
    cache.set('b', 'xxxx');
    vi.setSystemTime(T0 + 2);
    cache.set('c', 'xxxx');

    expect(cache.keys()).toEqual(['b', 'c']);
    expect(cache.getUsage()).toBe(12);
    expect(cache.getStats().evictions).toBe(1);
  });

  it('should track hits and misses without counting peeks', () => {
    const cache = new ResponseCache();
    cache.set('k', true);
    cache.get('k');
    cache.get('missing');
    cache.peek('k');

    const stats = cache.getStats();
    expect(stats.hits).toBe(1);
    expect(stats.misses).toBe(1);
    expect(stats.hitRate).toBe('50.00%');
  });

  it('should store nothing when disabled', () => {
    const cache = new ResponseCache({ enabled: false });
    cache.set('k', 1);
    expect(cache.get('k')).toBeUndefined();
    expect(cache.keys()).toEqual([]);
  });

  it('should persist unexpired entries and restore them', () => {
    const storage = new MemoryStorage();
    const cache = new ResponseCache({ ttlMs: 1000, storage });
    cache.set('old', 'a');
    vi.setSystemTime(T0 + 500);
    cache.set('fresh', 'b');
    vi.setSystemTime(T0 + 1200);

    expect(cache.persist()).toBe(true);

    const restored = new ResponseCache({ ttlMs: 1000, storage });
    expect(restored.restore()).toBe(1);
    expect(restored.get('fresh')).toBe('b');
    expect(restored.get('old')).toBeUndefined();
  });

  it('should ignore a snapshot of another format version', () => {
    const storage = new MemoryStorage();
    storage.setItem(CACHE_BACKUP_KEY, JSON.stringify({ version: 99, savedAt: T0, entries: [] }));
    expect(new ResponseCache({ storage }).restore()).toBe(0);
  });
});

describe('ResponseCache.generateCacheKey', () => {
  it('should generate deterministic keys with sorted params', () => {
    const keyA = ResponseCache.generateCacheKey('/api/v1/feedback', { b: 2, a: 1 });
    const keyB = ResponseCache.generateCacheKey('/api/v1/feedback', { a: 1, b: 2 });
    expect(keyA).toBe(keyB);
    expect(keyA).toBe('/api/v1/feedback?a=1&b=2');
  });

  it('should omit null/undefined params and always end the endpoint with ?', () => {
    expect(ResponseCache.generateCacheKey('/api/v1/members', { q: 'a', x: undefined, y: null })).toBe(
      '/api/v1/members?q=a',
    );
    expect(ResponseCache.generateCacheKey('/api/v1/members/m1')).toBe('/api/v1/members/m1?');
  });

  it('should include array params consistently', () => {
    const key = ResponseCache.generateCacheKey('/api/v1/feedback', { tags: ['a', 'b'] });
    expect(key).toBe('/api/v1/feedback?tags=%5Ba%2Cb%5D');
  });

  it('should stringify nested objects with stable key order', () => {
    const keyA = ResponseCache.generateCacheKey('/x', { range: { to: 2, from: 1 } });
    const keyB = ResponseCache.generateCacheKey('/x', { range: { from: 1, to: 2 } });
    expect(keyA).toBe(keyB);
  });
});
