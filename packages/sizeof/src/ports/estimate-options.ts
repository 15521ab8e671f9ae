/**
 * Explicit size, in bytes, for a value the generic estimator would otherwise
 * decompose field by field (class instances, functions, host objects).
 *
 * Return `undefined` to fall back to the generic estimate.
 */
export type OpaqueSizer = (value: object) => number | undefined

export type EstimateSizeOptions = {
  sizeOf?: OpaqueSizer
}
