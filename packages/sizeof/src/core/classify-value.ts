import type { EstimateSizeOptions } from "../ports/estimate-options"
import type { ValueShape } from "../ports/value-shape"
import {
  BIGINT_HEADER_BYTES,
  BOOLEAN_BYTES,
  DATE_BYTES,
  NUMBER_BYTES,
  SLOT_BYTES,
} from "./layout"

/**
 * Dispatch a runtime value onto one of the estimator's shapes.
 *
 * Plain objects, arrays, maps, sets, binary buffers and dates are decomposed
 * directly. Anything else (class instances, functions) is offered to
 * `options.sizeOf` first and decomposed as a record of its own enumerable fields
 * when the sizer declines.
 */
export function classifyValue(value: unknown, options: EstimateSizeOptions = {}): ValueShape {
  if (value === null) return { kind: "scalar", bytes: SLOT_BYTES }
  if (typeof value === "object") return classifyObject(value, options)
  if (typeof value === "function") return classifyCustom(value, options)
  if (typeof value === "string") {
    return { kind: "text", byteLength: Buffer.byteLength(value, "utf8") }
  }
  if (typeof value === "number") return { kind: "scalar", bytes: NUMBER_BYTES }
  if (typeof value === "boolean") return { kind: "scalar", bytes: BOOLEAN_BYTES }
  if (typeof value === "bigint") {
    return { kind: "scalar", bytes: BIGINT_HEADER_BYTES + bigintBytes(value) }
  }

  // undefined and symbols occupy one slot
  return { kind: "scalar", bytes: SLOT_BYTES }
}

function classifyObject(value: object, options: EstimateSizeOptions): ValueShape {
  if (value instanceof ArrayBuffer || value instanceof SharedArrayBuffer) {
    return { kind: "binary", target: value, byteLength: value.byteLength }
  }

  if (ArrayBuffer.isView(value)) {
    return { kind: "binary", target: value, byteLength: value.byteLength }
  }

  if (Array.isArray(value)) {
    const items: unknown[] = []
    value.forEach((item) => items.push(item))

    return { kind: "sequence", target: value, items, holes: value.length - items.length }
  }

  if (value instanceof Map) {
    return { kind: "mapping", target: value, entries: [...value.entries()] }
  }

  if (value instanceof Set) {
    return { kind: "sequence", target: value, items: [...value.values()], holes: 0 }
  }

  if (value instanceof Date) {
    return { kind: "opaque", target: value, bytes: DATE_BYTES }
  }

  if (isPlainObject(value)) {
    return { kind: "record", target: value, fields: Object.values(value) }
  }

  return classifyCustom(value, options)
}

function classifyCustom(value: object, options: EstimateSizeOptions): ValueShape {
  const explicit = options.sizeOf?.(value)

  if (explicit !== undefined) {
    if (!Number.isFinite(explicit) || explicit < 0) {
      throw new RangeError(`sizeOf must return a non-negative finite number, got: ${explicit}`)
    }

    return { kind: "opaque", target: value, bytes: explicit }
  }

  return { kind: "record", target: value, fields: Object.values(value) }
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}

function bigintBytes(value: bigint): number {
  const magnitude = value < 0n ? -value : value
  const bits = magnitude === 0n ? 1 : magnitude.toString(2).length

  return Math.ceil(bits / 8)
}
