export {
  createBoundedCache,
  type CreateBoundedCacheDeps,
  type CreateBoundedCacheOptions,
} from "./adapters/memory/create-bounded-cache"
export {
  MemoryBoundedCache,
  type MemoryBoundedCacheDeps,
  type MemoryCacheEntry,
} from "./adapters/memory/memory-bounded-cache"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export { type CacheEnv, cacheEnvSchema } from "./core/config/cache-env-schema"
export { loadCacheOptions, type LoadCacheOptionsOptions } from "./core/config/load-cache-options"
export {
  CacheError,
  type CacheErrorCode,
  type CacheErrorOptions,
  type ErrorContext,
  isCacheError,
  type SerializedError,
  type SerializeOptions,
  serializeError,
} from "./core/errors/cache-error"
export {
  CacheConfigError,
  type CacheConfigErrorCode,
  type ExhaustionReason,
  KeyExistsError,
  KeyNotFoundError,
  PolicyExhaustedError,
} from "./core/errors/errors"
export { createEvictionPolicy, resolveEvictionPolicyKind } from "./core/eviction/create-eviction-policy"
export type { EvictionPolicy, PolicyVictim } from "./core/eviction/eviction-policy"
export {
  FifoEvictionPolicy,
  type FifoEvictionPolicyOptions,
} from "./core/eviction/fifo-eviction-policy"
export { resolveCacheOptions } from "./core/options/resolve-cache-options"
export {
  ExpirationSweeper,
  type ExpirationSweeperDeps,
  type ExpirationSweeperOptions,
  type ExpirationTarget,
} from "./core/sweeper/expiration-sweeper"
export type { BoundedCache } from "./ports/bounded-cache"
export type { CacheEvictionPolicy, FifoCacheEvictionPolicy } from "./ports/cache-eviction-policy"
export type { CacheKey } from "./ports/cache-key"
export type { CacheOptions, CacheSeed, ResolvedCacheOptions } from "./ports/cache-options"
export type {
  CacheExpiringHit,
  CacheExpiringResult,
  CacheHit,
  CacheMiss,
  CacheResult,
} from "./ports/cache-result"
export { type CacheTtl, DEFAULT_EXPIRATION, NO_EXPIRATION } from "./ports/cache-ttl"
export type {
  CacheWriteFailure,
  CacheWriteResult,
  CacheWriteSuccess,
} from "./ports/cache-write-result"
export type { ConfigSource } from "./ports/config-source"
export type { EvictionListener, EvictionReason } from "./ports/eviction-listener"
