import type { Milliseconds } from "@boundcache/clock"
import type { CacheEvictionPolicy } from "./cache-eviction-policy"
import type { CacheKey } from "./cache-key"
import type { CacheTtl } from "./cache-ttl"

export type CacheOptions = {
  /** Upper bound on accounted bytes. Required; must be greater than zero. */
  memoryLimit: number

  /** Maximum number of entries. `0` disables the count bound. */
  capacity?: number

  /** Interval of the background expiration sweep. `0` disables the sweeper. */
  cleanupIntervalMs?: Milliseconds

  /** TTL applied when a write passes `DEFAULT_EXPIRATION`. `<= 0` means never. */
  defaultExpirationMs?: Milliseconds

  /** Policy name. `"fifo"`, `"queue"` and `""` all select FIFO. */
  evictionPolicy?: string

  /** Name bound into log records. */
  name?: string
}

export type ResolvedCacheOptions = {
  name: string
  memoryLimit: number
  capacity: number
  cleanupIntervalMs: Milliseconds
  defaultExpirationMs: Milliseconds
  evictionPolicy: CacheEvictionPolicy
}

/** An entry written into a cache as it is created. */
export type CacheSeed<V> = {
  key: CacheKey
  value: V
  /** Defaults to `DEFAULT_EXPIRATION`. */
  ttl?: CacheTtl
}
