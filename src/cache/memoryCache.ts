import type { CacheBackend, CacheEntry } from './types';

export function globToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
  return new RegExp(`^${escaped}$`);
}

export interface MemoryCacheOptions {
  now?: () => number;
  /** Oldest entries are evicted past this many. */
  maxEntries?: number;
  /** Minimum gap between sweeps of expired entries. */
  sweepIntervalMs?: number;
}

/**
 * Process-local backend. Values are structured-cloned on the way in and out
 * so callers can never mutate a cached result in place. Expired entries are
 * swept from `set` at most once per `sweepIntervalMs`.
 */
export class MemoryCacheBackend implements CacheBackend {
  private readonly entries = new Map<string, CacheEntry<unknown>>();
  private readonly now: () => number;
  private readonly maxEntries: number;
  private readonly sweepIntervalMs: number;
  private lastSweep: number;

  constructor(options: MemoryCacheOptions = {}) {
    this.now = options.now ?? Date.now;
    this.maxEntries = options.maxEntries ?? 10_000;
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
    this.lastSweep = this.now();
  }

  async get<T>(key: string): Promise<T | undefined> {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() > entry.expires) {
      this.entries.delete(key);
      return undefined;
    }

    // Only `set<T>` writes entries, so the stored value is the T it was given
    return structuredClone(entry.value) as T;
  }

  async set<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
    const now = this.now();
    if (now - this.lastSweep >= this.sweepIntervalMs) {
      this.cleanupExpired(now);
    }

    // Re-inserting moves the key to the back of the eviction order
    this.entries.delete(key);
    this.entries.set(key, {
      value: structuredClone(value),
      expires: now + ttlSeconds * 1000,
    });

    for (const oldest of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) break;
      this.entries.delete(oldest);
    }
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async invalidate(pattern: string): Promise<number> {
    const regex = globToRegExp(pattern);
    let deleted = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (regex.test(key)) {
        this.entries.delete(key);
        deleted++;
      }
    }
    return deleted;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  private cleanupExpired(now: number): void {
    for (const [key, entry] of this.entries) {
      if (now > entry.expires) {
        this.entries.delete(key);
      }
    }
    this.lastSweep = now;
  }

  /** Entries held in memory, expired or not. */
  get storedCount(): number {
    return this.entries.size;
  }

  /** Number of live (unexpired) entries. */
  get size(): number {
    const now = this.now();
    let live = 0;
    for (const entry of this.entries.values()) {
      if (now <= entry.expires) live++;
    }
    return live;
  }
}

/** Backend that stores nothing; every read misses. */
export class NoopCacheBackend implements CacheBackend {
  async get<T>(_key: string): Promise<T | undefined> {
    return undefined;
  }

  async set<T>(_key: string, _value: T, _ttlSeconds: number): Promise<void> {}

  async delete(_key: string): Promise<void> {}

  async invalidate(_pattern: string): Promise<number> {
    return 0;
  }

  async clear(): Promise<void> {}
}
