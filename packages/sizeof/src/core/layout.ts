/**
 * Byte costs of the fixed parts of a value's layout, modelled on a 64-bit heap.
 */

/** One reference-sized pointer. */
export const POINTER_BYTES = 8

/** An element or field slot that holds nothing (array hole, empty bucket slot). */
export const SLOT_BYTES = 8

export const NUMBER_BYTES = 8
export const BOOLEAN_BYTES = 4
export const BIGINT_HEADER_BYTES = 8
export const DATE_BYTES = 8

export const STRING_HEADER_BYTES = 16
export const BINARY_HEADER_BYTES = 24
export const SEQUENCE_HEADER_BYTES = 24
export const RECORD_HEADER_BYTES = 16

/** Average entries per bucket before a hash table grows. */
export const MAP_LOAD_FACTOR = 6.5
export const MAP_BUCKET_HEADER_BYTES = 16
export const MAP_SLOTS_PER_BUCKET = 8

/**
 * Approximate bucket count of a hash table holding `entries` entries: the entry count
 * over the load factor, rounded up to a power of two, with a minimum of one bucket.
 */
export function bucketCount(entries: number): number {
  if (entries <= 0) return 1

  return Math.max(1, 2 ** Math.ceil(Math.log2(entries / MAP_LOAD_FACTOR)))
}
