export { classifyValue } from "./core/classify-value"
export { estimateSize } from "./core/estimate-size"
export * from "./core/layout"
export type { EstimateSizeOptions, OpaqueSizer } from "./ports/estimate-options"
export type * from "./ports/value-shape"
