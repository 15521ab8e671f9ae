import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import type { ResolvedCacheOptions } from "../../ports/cache-options"
import type { ConfigSource } from "../../ports/config-source"
import { CacheConfigError } from "../errors/errors"
import { resolveCacheOptions } from "../options/resolve-cache-options"
import { cacheEnvSchema, cacheOptionsFromEnv } from "./cache-env-schema"

export type LoadCacheOptionsOptions = {
  /** Evaluated in order; later sources win. Defaults to the process environment. */
  sources?: ConfigSource[]
}

/**
 * Merge the `CACHE_*` keys from every source and resolve them to cache options.
 *
 * @example
 * ```ts
 * const options = await loadCacheOptions({
 *   sources: [new EnvSource(), new ObjectSource({ CACHE_CAPACITY: 1000 })],
 * })
 * const cache = createBoundedCache<Session>(options)
 * ```
 */
export async function loadCacheOptions({
  sources,
}: LoadCacheOptionsOptions = {}): Promise<ResolvedCacheOptions> {
  const merged: Record<string, unknown> = {}
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = cacheEnvSchema.safeParse(merged)

  if (!result.success) {
    throw new CacheConfigError(
      "invalid_cache_options",
      `Cache configuration validation failed:\n${z.prettifyError(result.error)}`,
      { context: { sources: resolvedSources.map((s) => s.name) }, cause: result.error },
    )
  }

  return resolveCacheOptions(cacheOptionsFromEnv(result.data))
}
