import type { CacheKey } from "../../ports/cache-key"

export type AdmissionRequest = {
  key: CacheKey
  /** Accounted bytes of the incoming entry. */
  size: number
}

/**
 * Cache state as seen by the incoming write. An entry already stored under the
 * request key is excluded from `count` and `memoryUsed`, since the write replaces it.
 */
export type AdmissionState = {
  count: number
  memoryUsed: number
  candidates: Iterable<CacheKey>
  sizeOf(key: CacheKey): number | undefined
}

export type AdmissionLimits = {
  capacity: number
  memoryLimit: number
}

export type PlannedEviction = {
  key: CacheKey
  reason: "capacity" | "memory"
}

export type AdmissionPlan =
  | { ok: true; evictions: readonly PlannedEviction[] }
  | { ok: false; reason: "capacity" | "memory"; evictions: readonly PlannedEviction[] }

/**
 * Work out which entries must go for `request` to fit, without touching the cache.
 *
 * Victims are taken from `state.candidates` in order, skipping the request key.
 * At most one victim is taken for the count bound; then victims are taken until
 * the entry fits the memory bound. A failed plan lists the evictions it had chosen
 * before running out of candidates.
 */
export function planAdmission(
  request: AdmissionRequest,
  state: AdmissionState,
  limits: AdmissionLimits,
): AdmissionPlan {
  const evictions: PlannedEviction[] = []
  const candidates = state.candidates[Symbol.iterator]()
  let count = state.count
  let memoryUsed = state.memoryUsed

  const take = (reason: PlannedEviction["reason"]): boolean => {
    for (let next = candidates.next(); !next.done; next = candidates.next()) {
      const key = next.value
      if (key === request.key) continue

      const size = state.sizeOf(key)
      if (size === undefined) {
        throw new Error(`Invariant violation: eviction candidate ${key} is not stored`)
      }

      evictions.push({ key, reason })
      count--
      memoryUsed -= size

      return true
    }

    return false
  }

  if (limits.capacity > 0 && count >= limits.capacity && !take("capacity")) {
    return { ok: false, reason: "capacity", evictions }
  }

  while (memoryUsed + request.size > limits.memoryLimit) {
    if (!take("memory")) return { ok: false, reason: "memory", evictions }
  }

  return { ok: true, evictions }
}
