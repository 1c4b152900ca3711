import type { CacheEntry } from "./cache-entry"
import type { CacheKey } from "./cache-key"
import type { CacheSetOptions } from "./cache-options"
import type { CacheResult } from "./cache-result"

/**
 * The operations a host application calls on its cache.
 *
 * @remarks
 * Cached values are derived data: entries may be evicted or expire at any
 * time, and a miss says nothing about the source of truth.
 */
export interface CacheBackend<T> {
  get(key: CacheKey): Promise<CacheResult<T>>

  /**
   * Read several keys. Every requested key is present in the returned map,
   * as a hit or a miss.
   */
  getMany(keys: readonly CacheKey[]): Promise<Map<CacheKey, CacheResult<T>>>

  /**
   * Store a value. Resolves to `false` when the cluster refused to store it.
   */
  set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<boolean>

  /**
   * Store several values with the same options.
   *
   * @returns The keys that were not stored; empty when all writes succeeded.
   */
  setMany(
    entries: readonly CacheEntry<T>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<CacheKey[]>

  /**
   * Remove a key. Resolves to `false` when there was nothing to remove.
   */
  delete(key: CacheKey): Promise<boolean>
}
