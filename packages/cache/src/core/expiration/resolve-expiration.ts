import type { Milliseconds } from "@boundcache/clock"
import { type CacheTtl, DEFAULT_EXPIRATION } from "../../ports/cache-ttl"

/**
 * Absolute expiry instant for a write made at `nowMs`, or `undefined` for never.
 */
export function resolveExpiresAt(
  ttl: CacheTtl,
  defaultTtl: CacheTtl,
  nowMs: Milliseconds,
): Milliseconds | undefined {
  const effective = ttl === DEFAULT_EXPIRATION ? defaultTtl : ttl

  if (!(effective > 0)) return undefined

  return nowMs + effective
}

/**
 * An entry is expired from its expiry instant onwards, not only once the instant
 * is behind `nowMs`. A TTL of `n` ms therefore gives exactly `n` ms of life, and a
 * read at the instant itself misses.
 */
export function isExpiredAt(expiresAtMs: Milliseconds | undefined, nowMs: Milliseconds): boolean {
  if (expiresAtMs === undefined) return false

  return expiresAtMs <= nowMs
}
