/**
 * First In, First Out (FIFO) eviction policy.
 *
 * Evicts entries in the order their keys were last written, regardless of reads.
 */
export type FifoCacheEvictionPolicy = "fifo"

export type CacheEvictionPolicy = FifoCacheEvictionPolicy

/** Names accepted from configuration that resolve to the FIFO policy. */
export const FIFO_POLICY_ALIASES: readonly string[] = ["fifo", "queue", ""]
