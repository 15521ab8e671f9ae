import type { Clock, Milliseconds } from "@boundcache/clock"
import type { Logger } from "@boundcache/logger"
import { estimateSize, type OpaqueSizer, POINTER_BYTES } from "@boundcache/sizeof"
import { planAdmission } from "../../core/admission/plan-admission"
import { KeyExistsError, KeyNotFoundError, PolicyExhaustedError } from "../../core/errors/errors"
import type { EvictionPolicy } from "../../core/eviction/eviction-policy"
import { isExpiredAt, resolveExpiresAt } from "../../core/expiration/resolve-expiration"
import { ExpirationSweeper } from "../../core/sweeper/expiration-sweeper"
import type { BoundedCache } from "../../ports/bounded-cache"
import type { CacheKey } from "../../ports/cache-key"
import type { ResolvedCacheOptions } from "../../ports/cache-options"
import type { CacheExpiringResult, CacheResult } from "../../ports/cache-result"
import { type CacheTtl, DEFAULT_EXPIRATION } from "../../ports/cache-ttl"
import type { CacheWriteResult } from "../../ports/cache-write-result"
import type { EvictionListener, EvictionReason } from "../../ports/eviction-listener"

export type MemoryBoundedCacheDeps = {
  clock: Clock
  logger: Logger
  policy: EvictionPolicy<CacheKey>
  /** Sizes class instances and functions the estimator cannot see into. */
  sizeOf?: OpaqueSizer
}

export type MemoryCacheEntry<V> = {
  value: V
  /** Accounted bytes: key, value and one slot pointer. */
  size: number
  expiresAtMs?: Milliseconds
}

type Departure<V> = {
  key: CacheKey
  value: V
  reason: EvictionReason
}

type CandidateScan = Iterable<CacheKey> & { keyAt: number | undefined }

type Eviction<V> = {
  departure: Departure<V>
  entry: MemoryCacheEntry<V>
}

export class MemoryBoundedCache<V> implements BoundedCache<V> {
  private readonly entries = new Map<CacheKey, MemoryCacheEntry<V>>()
  private readonly logger: Logger
  private readonly sweeper: ExpirationSweeper | undefined
  private bytes = 0
  private listener: EvictionListener<V> | undefined

  public constructor(
    private readonly deps: MemoryBoundedCacheDeps,
    private readonly opts: ResolvedCacheOptions,
  ) {
    this.logger = deps.logger.child({ module: "cache", cache: opts.name })

    if (opts.cleanupIntervalMs > 0) {
      this.sweeper = new ExpirationSweeper(
        this,
        { clock: deps.clock, logger: this.logger },
        { intervalMs: opts.cleanupIntervalMs },
      )
      this.sweeper.start()
    }
  }

  set(key: CacheKey, value: V, ttl: CacheTtl = DEFAULT_EXPIRATION): CacheWriteResult {
    return this.write(key, value, ttl)
  }

  setDefault(key: CacheKey, value: V): CacheWriteResult {
    return this.write(key, value, DEFAULT_EXPIRATION)
  }

  setIfAbsent(key: CacheKey, value: V, ttl: CacheTtl = DEFAULT_EXPIRATION): CacheWriteResult {
    if (this.live(key) !== undefined) return { ok: false, error: new KeyExistsError(key) }

    return this.write(key, value, ttl)
  }

  replace(key: CacheKey, value: V, ttl: CacheTtl = DEFAULT_EXPIRATION): CacheWriteResult {
    if (this.live(key) === undefined) return { ok: false, error: new KeyNotFoundError(key) }

    return this.write(key, value, ttl)
  }

  get(key: CacheKey): CacheResult<V> {
    const entry = this.live(key)
    if (entry === undefined) return { kind: "miss" }

    return { kind: "hit", value: entry.value }
  }

  getWithExpiration(key: CacheKey): CacheExpiringResult<V> {
    const entry = this.live(key)
    if (entry === undefined) return { kind: "miss" }

    return {
      kind: "hit",
      value: entry.value,
      expiresAt: entry.expiresAtMs === undefined ? undefined : new Date(entry.expiresAtMs),
    }
  }

  has(key: CacheKey): boolean {
    return this.live(key) !== undefined
  }

  delete(key: CacheKey): void {
    const entry = this.detach(key)
    if (entry === undefined) return

    this.notify([{ key, value: entry.value, reason: "removed" }])
  }

  deleteExpired(): number {
    const nowMs = this.deps.clock.nowMs()
    const expired: Departure<V>[] = []

    for (const [key, entry] of this.entries) {
      if (isExpiredAt(entry.expiresAtMs, nowMs)) {
        expired.push({ key, value: entry.value, reason: "expired" })
      }
    }

    for (const { key } of expired) this.detach(key)

    this.notify(expired)

    return expired.length
  }

  clear(): void {
    this.entries.clear()
    this.deps.policy.clear()
    this.bytes = 0
  }

  size(): number {
    return this.entries.size
  }

  memoryUsed(): number {
    return this.bytes
  }

  setEvictionListener(listener: EvictionListener<V> | undefined): void {
    this.listener = listener
  }

  async close(): Promise<void> {
    await this.sweeper?.stop()
  }

  /**
   * Plan evictions, commit them together with the new entry, then notify.
   * The cache is left untouched when the plan fails or the policy refuses the key.
   */
  private write(key: CacheKey, value: V, ttl: CacheTtl): CacheWriteResult {
    const size = this.measure(key, value)
    const previous = this.entries.get(key)
    const scan = this.scan(key)
    const plan = planAdmission(
      { key, size },
      {
        count: this.entries.size - (previous === undefined ? 0 : 1),
        memoryUsed: this.bytes - (previous?.size ?? 0),
        candidates: scan,
        sizeOf: (candidate) => this.entries.get(candidate)?.size,
      },
      { capacity: this.opts.capacity, memoryLimit: this.opts.memoryLimit },
    )

    if (!plan.ok) {
      this.logger.warn("write rejected: eviction policy exhausted", {
        key,
        reason: plan.reason,
        bytes: size,
      })

      return {
        ok: false,
        error: new PolicyExhaustedError(key, plan.reason, {
          requiredBytes: size,
          memoryLimit: this.opts.memoryLimit,
          capacity: this.opts.capacity,
        }),
      }
    }

    const evictions: Eviction<V>[] = []

    for (const { key: victim, reason } of plan.evictions) {
      const entry = this.detach(victim)
      if (entry !== undefined) {
        evictions.push({ departure: { key: victim, value: entry.value, reason }, entry })
      }
    }

    // An overwritten key stays tracked; track() below moves it to the back.
    if (previous !== undefined) {
      this.entries.delete(key)
      this.bytes -= previous.size
    }

    const nowMs = this.deps.clock.nowMs()
    const expiresAtMs = resolveExpiresAt(ttl, this.opts.defaultExpirationMs, nowMs)

    this.attach(key, expiresAtMs === undefined ? { value, size } : { value, size, expiresAtMs })

    if (!this.deps.policy.track(key)) {
      this.entries.delete(key)
      this.bytes -= size
      this.reinstate(key, previous, evictions, scan.keyAt)

      this.logger.warn("write rejected: eviction policy refused key", { key, bytes: size })

      return {
        ok: false,
        error: new PolicyExhaustedError(key, "rejected", { requiredBytes: size }),
      }
    }

    for (const { departure, entry } of evictions) {
      this.logger.debug("entry evicted", {
        key: departure.key,
        reason: departure.reason,
        bytes: entry.size,
      })
    }

    this.notify(evictions.map((e) => e.departure))

    return { ok: true }
  }

  /**
   * Policy candidates without `key`. `keyAt` records how many candidates were
   * yielded before `key` was passed over, if the scan reached it.
   */
  private scan(key: CacheKey): CandidateScan {
    const candidates = this.deps.policy.candidates()
    const scan: CandidateScan = {
      keyAt: undefined,
      *[Symbol.iterator]() {
        let yielded = 0

        for (const candidate of candidates) {
          if (candidate === key) {
            scan.keyAt = yielded
            continue
          }

          yielded++
          yield candidate
        }
      },
    }

    return scan
  }

  /**
   * Undo a refused write: put back the evicted and overwritten entries and
   * rebuild the policy in its order from before the write.
   *
   * The evictions were the head of that order, with `key` among them at `keyAt`
   * when the scan passed it. A refused key keeps its tracked position.
   */
  private reinstate(
    key: CacheKey,
    previous: MemoryCacheEntry<V> | undefined,
    evictions: readonly Eviction<V>[],
    keyAt: number | undefined,
  ): void {
    for (const { departure, entry } of evictions) this.attach(departure.key, entry)
    if (previous !== undefined) this.attach(key, previous)

    const victims = evictions.map((e) => e.departure.key)
    const head =
      keyAt === undefined ? victims : [...victims.slice(0, keyAt), key, ...victims.slice(keyAt)]
    const tail = [...this.deps.policy.candidates()].filter(
      (candidate) => keyAt === undefined || candidate !== key,
    )

    this.deps.policy.clear()

    for (const tracked of [...head, ...tail]) {
      if (!this.deps.policy.track(tracked)) {
        throw new Error(`Invariant violation: eviction policy refused to restore ${tracked}`)
      }
    }
  }

  private measure(key: CacheKey, value: V): number {
    const sizeOf = this.deps.sizeOf
    const valueBytes = estimateSize(value, sizeOf === undefined ? {} : { sizeOf })

    return estimateSize(key) + valueBytes + POINTER_BYTES
  }

  private live(key: CacheKey): MemoryCacheEntry<V> | undefined {
    const entry = this.entries.get(key)
    if (entry === undefined) return undefined

    return isExpiredAt(entry.expiresAtMs, this.deps.clock.nowMs()) ? undefined : entry
  }

  private attach(key: CacheKey, entry: MemoryCacheEntry<V>): void {
    this.entries.set(key, entry)
    this.bytes += entry.size
  }

  private detach(key: CacheKey): MemoryCacheEntry<V> | undefined {
    const entry = this.entries.get(key)
    if (entry === undefined) return undefined

    this.entries.delete(key)
    this.deps.policy.untrack(key)
    this.bytes -= entry.size

    return entry
  }

  private notify(departures: readonly Departure<V>[]): void {
    for (const { key, value, reason } of departures) {
      const listener = this.listener
      if (listener === undefined) return

      try {
        listener(key, value, reason)
      } catch (err) {
        this.logger.error("eviction listener failed", { key, reason, err })
      }
    }
  }
}
