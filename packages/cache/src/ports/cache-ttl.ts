import type { Milliseconds } from "@boundcache/clock"

/**
 * Per-write time-to-live in milliseconds.
 *
 * - `0` uses the cache's configured default.
 * - Any negative value means the entry never expires.
 * - Any positive value expires the entry that many milliseconds after the write.
 */
export type CacheTtl = Milliseconds

export const DEFAULT_EXPIRATION: CacheTtl = 0
export const NO_EXPIRATION: CacheTtl = -1
