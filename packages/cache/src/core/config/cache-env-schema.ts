import { z } from "zod"
import type { CacheOptions } from "../../ports/cache-options"

/**
 * Flat configuration keys, as found in the environment.
 *
 * Values arrive as strings and are coerced here. Range checks beyond what a raw
 * key can express are left to `resolveCacheOptions()`.
 */
export const cacheEnvSchema = z.object({
  CACHE_NAME: z.string().optional(),
  CACHE_MEMORY_LIMIT: z.coerce.number().int().nonnegative().optional(),
  CACHE_CAPACITY: z.coerce.number().int().nonnegative().optional(),
  CACHE_CLEANUP_INTERVAL_MS: z.coerce.number().nonnegative().optional(),
  CACHE_DEFAULT_EXPIRATION_MS: z.coerce.number().optional(),
  CACHE_EVICTION_POLICY: z.string().optional(),
})

export type CacheEnv = z.infer<typeof cacheEnvSchema>

export function cacheOptionsFromEnv(env: CacheEnv): CacheOptions {
  return {
    memoryLimit: env.CACHE_MEMORY_LIMIT ?? 0,
    ...(env.CACHE_NAME !== undefined && { name: env.CACHE_NAME }),
    ...(env.CACHE_CAPACITY !== undefined && { capacity: env.CACHE_CAPACITY }),
    ...(env.CACHE_CLEANUP_INTERVAL_MS !== undefined && {
      cleanupIntervalMs: env.CACHE_CLEANUP_INTERVAL_MS,
    }),
    ...(env.CACHE_DEFAULT_EXPIRATION_MS !== undefined && {
      defaultExpirationMs: env.CACHE_DEFAULT_EXPIRATION_MS,
    }),
    ...(env.CACHE_EVICTION_POLICY !== undefined && {
      evictionPolicy: env.CACHE_EVICTION_POLICY,
    }),
  }
}
