/**
 * A source of raw cache configuration values.
 *
 * Sources only load. Coercion and validation happen in `loadCacheOptions()`.
 * Later sources override earlier ones; `undefined` means "not provided".
 */
export interface ConfigSource {
  /** Human-readable name, e.g. "env" or "object:overrides". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
