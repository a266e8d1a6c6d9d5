/**
 * Key-value store behind the cache layer. Implementations may be in-process
 * or networked; all methods are async so either fits the same contract.
 */
export interface CacheBackend {
  get<T>(key: string): Promise<T | undefined>;
  /** `ttlSeconds` is required; entries never outlive it. */
  set<T>(key: string, value: T, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  /**
   * Removes every key matching a glob pattern (`*` any run, `?` one char).
   * Resolves with the number of keys removed.
   */
  invalidate(pattern: string): Promise<number>;
  clear(): Promise<void>;
}

export interface CacheEntry<T> {
  readonly value: T;
  readonly expires: number;
}
