export type PolicyVictim<K> = { kind: "victim"; key: K } | { kind: "empty" }

/**
 * Decides eviction order for a cache. Holds keys only; the cache owns the values.
 *
 * Implementations are driven synchronously by a single cache and need no locking.
 */
export interface EvictionPolicy<K> {
  /**
   * Start (or restart) tracking `key` as the most recent write.
   *
   * Returns `false` when the policy refuses the key; the caller must then undo
   * the write it was recording. A refusal leaves the tracked keys and their order
   * as they were.
   */
  track(key: K): boolean

  /** Stop tracking `key`. No-op for unknown keys. */
  untrack(key: K): void

  /** The key that would be evicted next, without removing it. */
  victim(): PolicyVictim<K>

  /**
   * Keys in eviction order, most evictable first.
   *
   * Lets a cache plan several evictions before mutating anything. The iterable must
   * not be consumed across a call to `track`, `untrack` or `clear`.
   */
  candidates(): Iterable<K>

  count(): number

  clear(): void
}
