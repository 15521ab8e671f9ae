import type { CacheKey } from "./cache-key"

/**
 * Why an entry left the cache.
 *
 * - `removed`: explicit `delete()`
 * - `expired`: removed by `deleteExpired()` or the background sweeper
 * - `capacity`: evicted to keep the entry count within `capacity`
 * - `memory`: evicted to keep accounted bytes within `memoryLimit`
 */
export type EvictionReason = "removed" | "expired" | "capacity" | "memory"

/**
 * Called once per departed entry, after the cache state is already updated.
 *
 * Listeners may call back into the cache. A listener that throws is logged and
 * does not stop notification of the remaining entries.
 */
export type EvictionListener<V> = (key: CacheKey, value: V, reason: EvictionReason) => void
