import { PlanarPoint } from '../../types/geometry';
import { logger } from '../../utils/logging/logger';
import { CacheStats, CoordinateSystem } from './types';

const SOURCE = 'TransformationCache';

// Rounding applied to cache keys: ~1 cm in every system
const METRIC_KEY_DECIMALS = 2;
const DEGREE_KEY_DECIMALS = 7;

export interface TransformationKey {
  from: CoordinateSystem;
  to: CoordinateSystem;
  frameCode: string | null;
  x: number;
  y: number;
}

/**
 * Bounded least-recently-used cache of transformed positions.
 * Map iteration order is insertion order, so the first key is the eldest.
 */
export class TransformationCache {
  private readonly entries = new Map<string, PlanarPoint>();
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  public get(key: TransformationKey): PlanarPoint | undefined {
    const cacheKey = TransformationCache.getCacheKey(key);
    const entry = this.entries.get(cacheKey);
    if (entry) {
      // Refresh recency
      this.entries.delete(cacheKey);
      this.entries.set(cacheKey, entry);
      this.hits++;
      return { ...entry };
    }

    this.misses++;
    return undefined;
  }

  public set(key: TransformationKey, value: PlanarPoint): void {
    const cacheKey = TransformationCache.getCacheKey(key);
    this.entries.delete(cacheKey);
    this.entries.set(cacheKey, { ...value });

    while (this.entries.size > this.capacity) {
      const eldest = this.entries.keys().next();
      if (eldest.done) break;
      this.entries.delete(eldest.value);
      this.evictions++;
    }
  }

  public has(key: TransformationKey): boolean {
    return this.entries.has(TransformationCache.getCacheKey(key));
  }

  public getStats(): CacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions
    };
  }

  public clear(): void {
    const size = this.entries.size;
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;

    logger.debug('Cleared transformation cache', { clearedEntries: size }, { source: SOURCE });
  }

  public static getCacheKey({ from, to, frameCode, x, y }: TransformationKey): string {
    const decimals = from === 'Geographic' ? DEGREE_KEY_DECIMALS : METRIC_KEY_DECIMALS;
    return `${from}:${to}:${frameCode ?? '-'}:${x.toFixed(decimals)}:${y.toFixed(decimals)}`;
  }
}
