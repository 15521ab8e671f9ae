/**
 * The closed set of shapes the estimator knows how to size.
 *
 * `scalar` and `text` are values stored inline. Every other shape is a heap object
 * reached through a reference; `target` is its identity, used for cycle detection.
 */
export type ScalarShape = {
  kind: "scalar"
  bytes: number
}

export type TextShape = {
  kind: "text"
  byteLength: number
}

export type BinaryShape = {
  kind: "binary"
  target: object
  byteLength: number
}

export type SequenceShape = {
  kind: "sequence"
  target: object
  items: readonly unknown[]
  /** Reserved slots holding no element (array holes), costed as empty slots. */
  holes: number
}

export type MappingShape = {
  kind: "mapping"
  target: object
  entries: readonly (readonly [unknown, unknown])[]
}

export type RecordShape = {
  kind: "record"
  target: object
  fields: readonly unknown[]
}

export type OpaqueShape = {
  kind: "opaque"
  target: object
  bytes: number
}

export type ReferenceShape =
  | BinaryShape
  | SequenceShape
  | MappingShape
  | RecordShape
  | OpaqueShape

export type ValueShape = ScalarShape | TextShape | ReferenceShape
