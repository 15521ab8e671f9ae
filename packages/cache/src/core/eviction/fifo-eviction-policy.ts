import type { EvictionPolicy, PolicyVictim } from "./eviction-policy"

export type FifoEvictionPolicyOptions = {
  /**
   * Maximum number of keys tracked at once. `track()` refuses new keys beyond it.
   * `0` or unset means unbounded.
   */
  maxKeys: number
}

/**
 * Evicts keys in the order they were last written.
 *
 * Re-tracking a known key moves it to the back of the queue. Reads never affect
 * the order.
 */
export class FifoEvictionPolicy<K> implements EvictionPolicy<K> {
  private readonly queue = new Set<K>()
  private readonly maxKeys: number

  constructor(opts: Partial<FifoEvictionPolicyOptions> = {}) {
    const maxKeys = opts.maxKeys ?? 0

    if (!Number.isInteger(maxKeys) || maxKeys < 0) {
      throw new RangeError(`maxKeys must be a non-negative integer, got ${maxKeys}`)
    }

    this.maxKeys = maxKeys
  }

  track(key: K): boolean {
    if (this.queue.delete(key)) {
      this.queue.add(key)

      return true
    }

    if (this.maxKeys > 0 && this.queue.size >= this.maxKeys) return false

    this.queue.add(key)

    return true
  }

  untrack(key: K): void {
    this.queue.delete(key)
  }

  victim(): PolicyVictim<K> {
    for (const key of this.queue) {
      return { kind: "victim", key }
    }

    return { kind: "empty" }
  }

  candidates(): Iterable<K> {
    return this.queue.keys()
  }

  count(): number {
    return this.queue.size
  }

  clear(): void {
    this.queue.clear()
  }
}
