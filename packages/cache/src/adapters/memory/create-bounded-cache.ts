import { type Clock, SystemClock } from "@boundcache/clock"
import { createNullLogger, type Logger } from "@boundcache/logger"
import type { OpaqueSizer } from "@boundcache/sizeof"
import { createEvictionPolicy } from "../../core/eviction/create-eviction-policy"
import type { EvictionPolicy } from "../../core/eviction/eviction-policy"
import { resolveCacheOptions } from "../../core/options/resolve-cache-options"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheOptions, CacheSeed } from "../../ports/cache-options"
import { MemoryBoundedCache } from "./memory-bounded-cache"

export type CreateBoundedCacheDeps = {
  /** Defaults to a system clock whose timers do not hold the process open. */
  clock: Clock
  /** Defaults to a logger that discards everything. */
  logger: Logger
  /** Overrides the policy named by `options.evictionPolicy`. */
  policy: EvictionPolicy<CacheKey>
  sizeOf: OpaqueSizer
}

export type CreateBoundedCacheOptions<V> = CacheOptions & {
  /**
   * Entries written in order once the cache exists, each through `set()`. Seeds
   * that do not fit are rejected and logged like any other write.
   */
  initial?: Iterable<CacheSeed<V>>
}

/**
 * Validate `options` and build an in-memory bounded cache.
 *
 * Starts the expiration sweeper when `cleanupIntervalMs > 0`; call `close()` to stop it.
 *
 * @throws CacheConfigError for invalid options.
 *
 * @example
 * ```ts
 * const cache = createBoundedCache<string>({ memoryLimit: 1_000_000, capacity: 100 })
 * cache.set("greeting", "hello", 60_000)
 * ```
 */
export function createBoundedCache<V>(
  options: CreateBoundedCacheOptions<V>,
  deps: Partial<CreateBoundedCacheDeps> = {},
): MemoryBoundedCache<V> {
  const { initial = [], ...cacheOptions } = options
  const resolved = resolveCacheOptions(cacheOptions)

  const cache = new MemoryBoundedCache<V>(
    {
      clock: deps.clock ?? new SystemClock({ keepAlive: false }),
      logger: deps.logger ?? createNullLogger(),
      policy: deps.policy ?? createEvictionPolicy<CacheKey>(resolved.evictionPolicy),
      ...(deps.sizeOf !== undefined && { sizeOf: deps.sizeOf }),
    },
    resolved,
  )

  for (const { key, value, ttl } of initial) cache.set(key, value, ttl)

  return cache
}
