import debug from 'debug';
import type { CacheBackend } from './types';

const log = debug('blog:cache');

export interface CacheLayerOptions {
  defaultTtlSeconds: number;
  /** Prepended to every key so several apps can share one backend. */
  keyPrefix?: string;
}

export interface RememberOptions<T> {
  ttlSeconds?: number;
  /** A computed value failing this check is returned but not stored. */
  cacheIf?: (value: T) => boolean;
}

/**
 * Front for a CacheBackend. The cache is an optimisation only: every backend
 * failure is logged here and treated as a miss (reads) or a no-op (writes),
 * never surfaced to the caller.
 */
export class CacheLayer {
  private readonly keyPrefix: string;

  constructor(
    private readonly backend: CacheBackend,
    private readonly options: CacheLayerOptions,
  ) {
    this.keyPrefix = options.keyPrefix ? `${options.keyPrefix}:` : '';
  }

  /** Cached value for `key`, computing and storing it on a miss. */
  async remember<T>(key: string, compute: () => Promise<T>, options: RememberOptions<T> = {}): Promise<T> {
    const fullKey = this.keyPrefix + key;

    try {
      const cached = await this.backend.get<T>(fullKey);
      if (cached !== undefined) {
        log('hit %s', fullKey);
        return cached;
      }
    } catch (error) {
      console.warn(`⚠️ Cache read failed for ${fullKey}, computing directly:`, error);
      return compute();
    }

    log('miss %s', fullKey);
    const value = await compute();
    if (options.cacheIf && !options.cacheIf(value)) {
      return value;
    }

    try {
      await this.backend.set(fullKey, value, options.ttlSeconds ?? this.options.defaultTtlSeconds);
    } catch (error) {
      console.warn(`⚠️ Cache write failed for ${fullKey}:`, error);
    }
    return value;
  }

  /**
   * Clears the given keys; entries containing `*` or `?` are glob patterns.
   * Every key is attempted even when an earlier one fails.
   */
  async invalidate(keys: Iterable<string>): Promise<void> {
    const unique = Array.from(new Set(keys));
    await Promise.all(unique.map((key) => this.invalidateOne(key)));
  }

  private async invalidateOne(key: string): Promise<void> {
    const fullKey = this.keyPrefix + key;
    try {
      if (/[*?]/.test(key)) {
        const removed = await this.backend.invalidate(fullKey);
        log('invalidated %s (%d keys)', fullKey, removed);
      } else {
        await this.backend.delete(fullKey);
        log('invalidated %s', fullKey);
      }
    } catch (error) {
      console.warn(`⚠️ Cache invalidation failed for ${fullKey}:`, error);
    }
  }

  async clear(): Promise<void> {
    try {
      await this.backend.clear();
    } catch (error) {
      console.warn('⚠️ Cache clear failed:', error);
    }
  }
}
