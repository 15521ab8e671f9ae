import type { EstimateSizeOptions } from "../ports/estimate-options"
import type { ReferenceShape } from "../ports/value-shape"
import { classifyValue } from "./classify-value"
import {
  BINARY_HEADER_BYTES,
  bucketCount,
  MAP_BUCKET_HEADER_BYTES,
  MAP_SLOTS_PER_BUCKET,
  POINTER_BYTES,
  RECORD_HEADER_BYTES,
  SEQUENCE_HEADER_BYTES,
  SLOT_BYTES,
  STRING_HEADER_BYTES,
} from "./layout"

/**
 * Estimate the deep memory footprint of `value`, in bytes.
 *
 * Heap objects are reached through a reference and cost `POINTER_BYTES` plus their
 * contents. Each object's contents are counted at most once per call: revisiting an
 * object (shared or cyclic reference) costs only the pointer, so a cyclic graph sizes
 * the same as the graph with the back-reference set to `null`.
 *
 * @example
 * ```ts
 * estimateSize("hello")          // 21
 * estimateSize({ a: 1, b: "x" }) // 49
 * ```
 */
export function estimateSize(value: unknown, options: EstimateSizeOptions = {}): number {
  return new SizeEstimation(options).measure(value)
}

/**
 * Walks the value graph with an explicit work stack so nesting depth is bounded by
 * heap, not by the call stack. Totals do not depend on visit order: whichever
 * occurrence of a shared object is popped first pays for its contents.
 */
class SizeEstimation {
  private readonly seen = new Set<object>()
  private readonly pending: unknown[] = []

  constructor(private readonly options: EstimateSizeOptions) {}

  measure(root: unknown): number {
    let bytes = 0

    this.pending.push(root)
    while (this.pending.length > 0) bytes += this.visit(this.pending.pop())

    return bytes
  }

  /** Own bytes of `value`; its children are queued, not measured. */
  private visit(value: unknown): number {
    const shape = classifyValue(value, this.options)

    switch (shape.kind) {
      case "scalar":
        return shape.bytes
      case "text":
        return STRING_HEADER_BYTES + shape.byteLength
      default:
        if (this.seen.has(shape.target)) return POINTER_BYTES

        this.seen.add(shape.target)

        return POINTER_BYTES + this.visitTarget(shape)
    }
  }

  private visitTarget(shape: ReferenceShape): number {
    switch (shape.kind) {
      case "binary":
        return BINARY_HEADER_BYTES + shape.byteLength
      case "opaque":
        return shape.bytes
      case "sequence":
        this.enqueue(shape.items)

        return SEQUENCE_HEADER_BYTES + shape.holes * SLOT_BYTES
      case "record":
        this.enqueue(shape.fields)

        return RECORD_HEADER_BYTES
      case "mapping": {
        const buckets = bucketCount(shape.entries.length)
        const emptySlots = MAP_SLOTS_PER_BUCKET * buckets - shape.entries.length

        for (const [key, value] of shape.entries) this.pending.push(key, value)

        return MAP_BUCKET_HEADER_BYTES * buckets + emptySlots * 2 * SLOT_BYTES
      }
    }
  }

  private enqueue(values: readonly unknown[]): void {
    for (const value of values) this.pending.push(value)
  }
}
