import type { CacheKey } from "../../ports/cache-key"
import { CacheError, type ErrorContext } from "./cache-error"

export type CacheConfigErrorCode =
  | "memory_limit_required"
  | "invalid_cache_options"
  | "unsupported_eviction_policy"

/** Raised while building a cache from options or configuration sources. */
export class CacheConfigError extends CacheError<CacheConfigErrorCode> {
  constructor(
    code: CacheConfigErrorCode,
    message: string,
    options: { context?: ErrorContext; cause?: unknown } = {},
  ) {
    super(message, { code, ...options })
  }
}

export class KeyExistsError extends CacheError<"key_exists"> {
  constructor(readonly key: CacheKey) {
    super(`Item ${key} already exists`, { code: "key_exists", context: { key } })
  }
}

export class KeyNotFoundError extends CacheError<"key_not_found"> {
  constructor(readonly key: CacheKey) {
    super(`Item ${key} not found`, { code: "key_not_found", context: { key } })
  }
}

/**
 * Why a write could not be admitted.
 *
 * - `capacity`: the count bound needs a victim but none is available
 * - `memory`: every other entry would have to go and the entry still would not fit
 * - `rejected`: the eviction policy refused to track the key
 */
export type ExhaustionReason = "capacity" | "memory" | "rejected"

export class PolicyExhaustedError extends CacheError<"policy_exhausted"> {
  constructor(
    readonly key: CacheKey,
    readonly reason: ExhaustionReason,
    context: ErrorContext = {},
  ) {
    super(`Eviction policy exhausted while admitting ${key} (${reason})`, {
      code: "policy_exhausted",
      context: { key, reason, ...context },
    })
  }
}
