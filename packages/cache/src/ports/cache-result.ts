export type CacheHit<T> = {
  kind: "hit"
  value: T
}

export type CacheMiss = {
  kind: "miss"
}

export type CacheResult<T> = CacheHit<T> | CacheMiss

/**
 * A hit that also carries the entry's expiration instant.
 *
 * `expiresAt` is `undefined` for entries that never expire.
 */
export type CacheExpiringHit<T> = CacheHit<T> & {
  expiresAt: Date | undefined
}

export type CacheExpiringResult<T> = CacheExpiringHit<T> | CacheMiss
