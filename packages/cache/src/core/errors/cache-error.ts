export type CacheErrorCode =
  | "memory_limit_required"
  | "invalid_cache_options"
  | "unsupported_eviction_policy"
  | "key_exists"
  | "key_not_found"
  | "policy_exhausted"

/**
 * Structured metadata attached to errors, kept out of the message string.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type CacheErrorOptions<C extends CacheErrorCode = CacheErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

/**
 * Serialized error shape for log records and transport. JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>

export class CacheError<C extends CacheErrorCode = CacheErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  /** `true` if retrying the same call might succeed. */
  readonly isRetryable: boolean
  /**
   * `true` for expected runtime failures (bad input, full cache), `false` for
   * invariant violations.
   */
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: CacheErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

/**
 * Serialize any thrown value to a consistent shape.
 *
 * Cache errors keep their code, context and flags; other errors get code `unknown`
 * and are marked non-operational.
 */
export function serializeError(err: unknown, options: SerializeOptions = {}): SerializedError {
  if (!(err instanceof Error)) {
    return {
      name: "NonErrorThrown",
      code: "unknown",
      message: typeof err === "string" ? err : "Unknown error",
      context: { value: err },
      isRetryable: false,
      isOperational: false,
      timestamp: new Date().toISOString(),
    }
  }

  const known = err instanceof CacheError ? err : undefined

  return {
    name: err.name,
    code: known?.code ?? "unknown",
    message: err.message,
    context: { ...known?.context },
    isRetryable: known?.isRetryable ?? false,
    isOperational: known?.isOperational ?? false,
    timestamp: (known?.timestamp ?? new Date()).toISOString(),
    ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
    ...(options.includeStack && err.stack && { stack: err.stack }),
  }
}

/**
 * Type guard for errors raised by the cache, optionally narrowed to one code.
 *
 * @example
 * ```ts
 * if (!result.ok && isCacheError(result.error, "key_exists")) return
 * ```
 */
export function isCacheError<C extends CacheErrorCode>(
  err: unknown,
  code?: C,
): err is CacheError<C> {
  if (!(err instanceof CacheError)) return false

  return code === undefined || err.code === code
}
