/**
 * Unit tests for PageBitmapCache
 */

import { describe, it, expect, vi } from 'vitest';
import {
  PageBitmapCache,
  cacheKeyFor,
  serializeCacheKey,
  type CacheKey,
  type ProducedBitmap,
} from '@/reader/renderer/pdf/page-bitmap-cache';

function key(pageIndex: number, generation = 0): CacheKey {
  return { generation, pageIndex, width: 4, height: 2, colorMode: 'color' };
}

function bitmap(fill = 0): ProducedBitmap {
  return { width: 4, height: 2, pixels: new Uint8Array(4 * 2 * 4).fill(fill) };
}

describe('PageBitmapCache', () => {
  it('should serialize equal keys to equal strings', () => {
    const fromRequest = cacheKeyFor({ pageIndex: 3, targetPixelWidth: 4, targetPixelHeight: 2, colorMode: 'color' }, 1);

    expect(serializeCacheKey(fromRequest)).toBe('g1:p3:4x2:color');
    expect(serializeCacheKey(fromRequest)).toBe(serializeCacheKey(key(3, 1)));
  });

  it('should return the cached bitmap without producing again', async () => {
    const cache = new PageBitmapCache({ capacity: 3 });
    const producer = vi.fn(async () => bitmap(7));

    const first = await cache.getOrInsert(key(0), producer);
    const second = await cache.getOrInsert(key(0), producer);

    expect(producer).toHaveBeenCalledTimes(1);
    expect(second.pixels).toBe(first.pixels);
    expect(cache.getStats()).toMatchObject({ hits: 1, misses: 1, size: 1 });
  });

  it('should share one producer call between concurrent requests', async () => {
    const cache = new PageBitmapCache({ capacity: 3 });
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const producer = vi.fn(async () => {
      await gate;
      return bitmap(1);
    });

    const pending = [cache.getOrInsert(key(0), producer), cache.getOrInsert(key(0), producer), cache.getOrInsert(key(0), producer)];
    expect(cache.getStats().inFlight).toBe(1);

    release();
    const results = await Promise.all(pending);

    expect(producer).toHaveBeenCalledTimes(1);
    expect(results[1].pixels).toBe(results[0].pixels);
    expect(results[2].pixels).toBe(results[0].pixels);
    expect(cache.getStats().inFlight).toBe(0);
  });

  it('should evict the least recently used entry', async () => {
    const cache = new PageBitmapCache({ capacity: 2, now: () => 0 });

    await cache.getOrInsert(key(0), async () => bitmap());
    await cache.getOrInsert(key(1), async () => bitmap());
    await cache.getOrInsert(key(0), async () => bitmap());
    await cache.getOrInsert(key(2), async () => bitmap());

    expect(cache.keys()).toEqual(['g0:p0:4x2:color', 'g0:p2:4x2:color']);
    expect(cache.has(key(1))).toBe(false);
    expect(cache.getStats().evictions).toBe(1);
  });

  it('should never hold more than its capacity', async () => {
    const cache = new PageBitmapCache({ capacity: 3 });
    for (let page = 0; page < 20; page++) {
      await cache.getOrInsert(key(page % 7), async () => bitmap());
      expect(cache.getStats().size).toBeLessThanOrEqual(3);
    }
  });

  it('should leave the cache unchanged when the producer fails', async () => {
    const cache = new PageBitmapCache({ capacity: 3 });

    await expect(
      cache.getOrInsert(key(0), async () => {
        throw new Error('corrupt page stream');
      })
    ).rejects.toThrow('corrupt page stream');
    expect(cache.has(key(0))).toBe(false);
    expect(cache.getStats().inFlight).toBe(0);

    const producer = vi.fn(async () => bitmap());
    await cache.getOrInsert(key(0), producer);
    expect(producer).toHaveBeenCalledTimes(1);
    expect(cache.has(key(0))).toBe(true);
  });

  it('should not insert results produced for an older generation', async () => {
    const cache = new PageBitmapCache({ capacity: 3 });
    await cache.getOrInsert(key(1), async () => bitmap());

    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const pending = cache.getOrInsert(key(0), async () => {
      await gate;
      return bitmap(9);
    });

    expect(cache.bumpGeneration()).toBe(1);
    release();
    const view = await pending;

    expect(view.pixels[0]).toBe(9);
    expect(cache.has(key(0))).toBe(false);
    expect(cache.has(key(1))).toBe(false);
    expect(cache.getStats().size).toBe(0);
  });
});
