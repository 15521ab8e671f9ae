import { MAX_TIMER_DELAY_MS } from "@boundcache/clock"
import { z } from "zod"
import type { CacheOptions, ResolvedCacheOptions } from "../../ports/cache-options"
import { CacheConfigError } from "../errors/errors"
import { resolveEvictionPolicyKind } from "../eviction/create-eviction-policy"

const DEFAULT_CACHE_NAME = "cache"

const cacheOptionsSchema = z.object({
  name: z.string().min(1).default(DEFAULT_CACHE_NAME),
  memoryLimit: z.number().int().positive(),
  capacity: z.number().int().nonnegative().default(0),
  cleanupIntervalMs: z.number().nonnegative().max(MAX_TIMER_DELAY_MS).default(0),
  defaultExpirationMs: z.number().default(0),
  evictionPolicy: z.string().optional(),
})

/**
 * Validate user options and fill in defaults.
 *
 * @throws CacheConfigError
 * - `memory_limit_required` when `memoryLimit` is missing or zero
 * - `unsupported_eviction_policy` for an unknown policy name
 * - `invalid_cache_options` for any other invalid field
 */
export function resolveCacheOptions(options: CacheOptions): ResolvedCacheOptions {
  if (!options.memoryLimit) {
    throw new CacheConfigError(
      "memory_limit_required",
      "memoryLimit is required and must be greater than zero",
      { context: { memoryLimit: options.memoryLimit } },
    )
  }

  const result = cacheOptionsSchema.safeParse(options)

  if (!result.success) {
    throw new CacheConfigError(
      "invalid_cache_options",
      `Invalid cache options:\n${z.prettifyError(result.error)}`,
      { cause: result.error },
    )
  }

  const { evictionPolicy, ...rest } = result.data

  return { ...rest, evictionPolicy: resolveEvictionPolicyKind(evictionPolicy) }
}
