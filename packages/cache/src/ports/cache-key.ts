/**
 * Keys are plain strings and compare by value.
 *
 * @example
 * ```ts
 * const key: CacheKey = "session:42"
 * ```
 */
export type CacheKey = string
