import type { CacheError } from "../core/errors/cache-error"

export type CacheWriteSuccess = {
  ok: true
}

export type CacheWriteFailure<E extends CacheError = CacheError> = {
  ok: false
  error: E
}

/**
 * Outcome of a write. Failed writes leave the cache exactly as it was.
 */
export type CacheWriteResult = CacheWriteSuccess | CacheWriteFailure
