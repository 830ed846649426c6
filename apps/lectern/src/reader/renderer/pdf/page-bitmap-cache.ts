/**
 * Page Bitmap Cache
 *
 * Small LRU of rasterized pages keyed by (generation, render request).
 * Entries are only ever inserted complete; concurrent requests for the same
 * key share one producer call.
 *
 * Pixel buffers are owned by the cache. Callers receive a read-only view and
 * must copy (crop) before handing data to anything that outlives the frame.
 */

import type { Logger } from 'pino';
import { componentLogger } from '../../../logging/logger';
import type { ColorMode, RenderRequest } from './viewport-controller';

export interface CacheKey {
  generation: number;
  pageIndex: number;
  width: number;
  height: number;
  colorMode: ColorMode;
}

export interface BitmapView {
  readonly key: CacheKey;
  readonly width: number;
  readonly height: number;
  /** Shared with the cache; never written to */
  readonly pixels: Uint8Array;
}

export interface ProducedBitmap {
  width: number;
  height: number;
  pixels: Uint8Array;
}

interface CachedBitmap {
  key: CacheKey;
  pixels: Uint8Array;
  width: number;
  height: number;
  lastUsedAt: number;
}

export interface BitmapCacheStats {
  hits: number;
  misses: number;
  evictions: number;
  size: number;
  capacity: number;
  inFlight: number;
}

export interface PageBitmapCacheOptions {
  capacity?: number;
  logger?: Logger;
  /** Injected for tests */
  now?: () => number;
}

export function cacheKeyFor(request: RenderRequest, generation: number): CacheKey {
  return {
    generation,
    pageIndex: request.pageIndex,
    width: request.targetPixelWidth,
    height: request.targetPixelHeight,
    colorMode: request.colorMode,
  };
}

/** Canonical string form; equal keys map to equal strings. */
export function serializeCacheKey(key: CacheKey): string {
  return `g${key.generation}:p${key.pageIndex}:${key.width}x${key.height}:${key.colorMode}`;
}

export class PageBitmapCache {
  private entries = new Map<string, CachedBitmap>();
  private inFlight = new Map<string, Promise<BitmapView>>();
  private generation = 0;
  private readonly capacity: number;
  private readonly log: Logger;
  private readonly now: () => number;
  private tick = 0;

  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: PageBitmapCacheOptions = {}) {
    this.capacity = Math.max(1, Math.floor(options.capacity ?? 3));
    this.log = componentLogger('PageBitmapCache', options.logger);
    this.now = options.now ?? (() => Date.now());
  }

  getGeneration(): number {
    return this.generation;
  }

  /**
   * Drop every entry and start a new generation. In-flight producers keep
   * running but their results are not inserted.
   */
  bumpGeneration(): number {
    this.generation++;
    this.entries.clear();
    this.inFlight.clear();
    this.log.debug({ generation: this.generation }, 'generation bumped');
    return this.generation;
  }

  has(key: CacheKey): boolean {
    return this.entries.has(serializeCacheKey(key));
  }

  /**
   * Return the cached bitmap for `key`, or run `producer` once and cache its
   * result. A failing producer leaves the cache unchanged.
   */
  getOrInsert(key: CacheKey, producer: () => Promise<ProducedBitmap>): Promise<BitmapView> {
    const id = serializeCacheKey(key);

    const cached = this.entries.get(id);
    if (cached) {
      this.touch(id, cached);
      this.hits++;
      this.log.debug({ key: id }, 'cache hit');
      return Promise.resolve(toView(cached));
    }

    const pending = this.inFlight.get(id);
    if (pending) {
      this.log.debug({ key: id }, 'joined in-flight render');
      return pending;
    }

    this.misses++;
    this.log.debug({ key: id }, 'cache miss');

    const promise: Promise<BitmapView> = this.produce(key, id, producer).finally(() => {
      if (this.inFlight.get(id) === promise) {
        this.inFlight.delete(id);
      }
    });
    this.inFlight.set(id, promise);
    return promise;
  }

  private async produce(key: CacheKey, id: string, producer: () => Promise<ProducedBitmap>): Promise<BitmapView> {
    const bitmap = await producer();
    const entry: CachedBitmap = {
      key,
      pixels: bitmap.pixels,
      width: bitmap.width,
      height: bitmap.height,
      lastUsedAt: this.stamp(),
    };

    if (key.generation === this.generation) {
      this.insert(id, entry);
    } else {
      this.log.debug({ key: id, generation: this.generation }, 'stale generation, not cached');
    }
    return toView(entry);
  }

  private insert(id: string, entry: CachedBitmap): void {
    this.entries.delete(id);
    while (this.entries.size >= this.capacity) {
      this.evictLeastRecentlyUsed();
    }
    this.entries.set(id, entry);
  }

  private evictLeastRecentlyUsed(): void {
    let oldestId: string | undefined;
    let oldestAt = Infinity;
    for (const [id, entry] of this.entries) {
      if (entry.lastUsedAt < oldestAt) {
        oldestAt = entry.lastUsedAt;
        oldestId = id;
      }
    }
    if (oldestId === undefined) return;

    this.entries.delete(oldestId);
    this.evictions++;
    this.log.debug({ key: oldestId, capacity: this.capacity }, 'evicted');
  }

  private touch(id: string, entry: CachedBitmap): void {
    entry.lastUsedAt = this.stamp();
    // Keep map order in step with recency for iteration in debug output.
    this.entries.delete(id);
    this.entries.set(id, entry);
  }

  /**
   * Monotonic per cache: two touches in the same millisecond still order.
   */
  private stamp(): number {
    this.tick = Math.max(this.tick + 1, this.now());
    return this.tick;
  }

  /** Keys in least- to most-recently-used order. */
  keys(): string[] {
    return [...this.entries.values()]
      .sort((a, b) => a.lastUsedAt - b.lastUsedAt)
      .map((entry) => serializeCacheKey(entry.key));
  }

  clear(): void {
    this.entries.clear();
    this.inFlight.clear();
  }

  getStats(): BitmapCacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      size: this.entries.size,
      capacity: this.capacity,
      inFlight: this.inFlight.size,
    };
  }
}

function toView(entry: CachedBitmap): BitmapView {
  return {
    key: entry.key,
    width: entry.width,
    height: entry.height,
    pixels: entry.pixels,
  };
}
