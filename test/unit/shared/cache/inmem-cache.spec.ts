import { afterEach, describe, it, expect, vi } from 'vitest';
import { InMemCache } from '../../../../src/shared/cache/inmem-cache';

describe('InMemCache', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('set/get/del round-trip a value', async () => {
    const cache = new InMemCache();

    await cache.set('k', 'v');
    expect(await cache.get('k')).toBe('v');

    await cache.del('k');
    expect(await cache.get('k')).toBeNull();
  });

  it('expires values after ttlSeconds', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const cache = new InMemCache();

    await cache.set('k', 'v', { ttlSeconds: 10 });

    vi.setSystemTime(new Date('2026-01-01T00:00:09Z'));
    expect(await cache.get('k')).toBe('v');

    vi.setSystemTime(new Date('2026-01-01T00:00:10Z'));
    expect(await cache.get('k')).toBeNull();
  });

  it('incr counts from 1 and keeps the first expiry', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    const cache = new InMemCache();

    expect(await cache.incr('hits', { ttlSeconds: 60 })).toBe(1);

    vi.setSystemTime(new Date('2026-01-01T00:00:30Z'));
    expect(await cache.incr('hits', { ttlSeconds: 60 })).toBe(2);

    // 60s after the first incr, not the second
    vi.setSystemTime(new Date('2026-01-01T00:01:00Z'));
    expect(await cache.get('hits')).toBeNull();
  });

  it('ping fails after close', async () => {
    const cache = new InMemCache();
    await expect(cache.ping()).resolves.toBeUndefined();

    await cache.close();

    await expect(cache.ping()).rejects.toThrowError('InMemCache is closed');
  });
});
