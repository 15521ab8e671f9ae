import type { Milliseconds } from "@boundcache/clock"

/**
 * Well-known fields bound into log records emitted by a cache and its helpers.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  /** Name of the cache instance emitting the record. */
  cache: string
  key: string
  reason: string

  bytes: number
  count: number
  durationMs: Milliseconds
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
