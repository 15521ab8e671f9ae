import type { CacheKey } from "./cache-key"
import type { CacheExpiringResult, CacheResult } from "./cache-result"
import type { CacheTtl } from "./cache-ttl"
import type { CacheWriteResult } from "./cache-write-result"
import type { EvictionListener } from "./eviction-listener"

/**
 * An in-process key/value cache bounded by entry count and accounted memory.
 *
 * Every operation runs to completion before the next one starts, so readers never
 * observe a partially applied write. Eviction listeners run after the write that
 * triggered them has been applied.
 */
export interface BoundedCache<V> {
  /**
   * Insert or replace `key`, evicting older entries when a bound would be exceeded.
   *
   * Fails with `policy_exhausted` when no amount of eviction makes room.
   */
  set(key: CacheKey, value: V, ttl?: CacheTtl): CacheWriteResult

  /** `set()` with the cache's default expiration. */
  setDefault(key: CacheKey, value: V): CacheWriteResult

  /** Insert only when `key` is absent or expired; otherwise fails with `key_exists`. */
  setIfAbsent(key: CacheKey, value: V, ttl?: CacheTtl): CacheWriteResult

  /** Replace only when a live entry exists; otherwise fails with `key_not_found`. */
  replace(key: CacheKey, value: V, ttl?: CacheTtl): CacheWriteResult

  get(key: CacheKey): CacheResult<V>
  getWithExpiration(key: CacheKey): CacheExpiringResult<V>
  has(key: CacheKey): boolean

  /** Remove `key` if present, notifying the listener with reason `removed`. */
  delete(key: CacheKey): void

  /** Remove every expired entry and return how many were removed. */
  deleteExpired(): number

  /** Drop every entry without notifying the listener. */
  clear(): void

  /** Number of stored entries, including expired ones not yet removed. */
  size(): number

  /** Accounted bytes of all stored entries. */
  memoryUsed(): number

  /** Install or clear (`undefined`) the eviction listener. */
  setEvictionListener(listener: EvictionListener<V> | undefined): void

  /** Stop background work. Safe to call more than once. */
  close(): Promise<void>
}
