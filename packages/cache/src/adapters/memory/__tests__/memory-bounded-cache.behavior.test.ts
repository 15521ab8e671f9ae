import { FakeClock } from "@boundcache/clock"
import { isCacheError } from "../../../core/errors/cache-error"
import { FifoEvictionPolicy } from "../../../core/eviction/fifo-eviction-policy"
import { captureLogs } from "../../../tests/utils/capture-logs"
import {
  createTestCache,
  keys,
  recordEvictions,
  SMALL_ENTRY_BYTES,
} from "../../../tests/utils/cache-test-helpers"
import { createBoundedCache } from "../create-bounded-cache"

const ALPHABET = "abcdefghijklmnopqrstuvwxyz"

/** 17 (key) + 42 (value) + 8 (slot pointer). */
const ALPHABET_ENTRY_BYTES = 67

describe("MemoryBoundedCache (behavior)", () => {
  describe("memory accounting", () => {
    it("charges key, value and a slot pointer per entry", () => {
      const { cache } = createTestCache<unknown>()

      cache.set(keys.one(), "a")
      cache.set(keys.two(), 5)

      expect(cache.memoryUsed()).toBe(SMALL_ENTRY_BYTES + 33)
    })

    it("tracks the sum of stored entries across writes and deletes", () => {
      const { cache } = createTestCache()

      cache.set(keys.one(), "a")
      cache.set(keys.two(), "b")
      cache.set(keys.three(), "c")
      expect(cache.memoryUsed()).toBe(3 * SMALL_ENTRY_BYTES)

      cache.delete(keys.two())
      expect(cache.memoryUsed()).toBe(2 * SMALL_ENTRY_BYTES)

      cache.set(keys.one(), ALPHABET)
      expect(cache.memoryUsed()).toBe(SMALL_ENTRY_BYTES + ALPHABET_ENTRY_BYTES)
    })

    it("sizes opaque values through the injected sizer", () => {
      class Payload {}
      const { cache } = createTestCache<Payload>(
        {},
        { sizeOf: (value) => (value instanceof Payload ? 100 : undefined) },
      )

      cache.set(keys.one(), new Payload())

      expect(cache.memoryUsed()).toBe(17 + 108 + 8)
    })
  })

  describe("capacity bound", () => {
    it("evicts the oldest key when a new key arrives at capacity", () => {
      const { cache } = createTestCache({ capacity: 2 })
      const evictions = recordEvictions(cache)

      cache.set(keys.one(), "a")
      cache.set(keys.two(), "b")
      cache.set(keys.three(), "c")

      expect(cache.has(keys.one())).toBe(false)
      expect(cache.has(keys.two())).toBe(true)
      expect(cache.has(keys.three())).toBe(true)
      expect(cache.size()).toBe(2)
      expect(evictions).toStrictEqual([{ key: "1", value: "a", reason: "capacity" }])
    })

    it("overwriting a key at capacity evicts nothing", () => {
      const { cache } = createTestCache({ capacity: 2 })
      const evictions = recordEvictions(cache)
      cache.set(keys.one(), "a")
      cache.set(keys.two(), "b")

      cache.set(keys.one(), "z")

      expect(cache.size()).toBe(2)
      expect(evictions).toStrictEqual([])
    })

    it("replace moves the key to the back of the eviction order", () => {
      const { cache } = createTestCache({ capacity: 2 })
      cache.set(keys.one(), "a")
      cache.set(keys.two(), "b")

      cache.replace(keys.one(), "z")
      cache.set(keys.three(), "c")

      expect(cache.get(keys.one())).toStrictEqual({ kind: "hit", value: "z" })
      expect(cache.has(keys.two())).toBe(false)
      expect(cache.has(keys.three())).toBe(true)
    })

    it("evicted entries that were expired are still reported as capacity evictions", () => {
      const { cache, clock } = createTestCache({ capacity: 1 })
      const evictions = recordEvictions(cache)
      cache.set(keys.one(), "a", 10)
      clock.advance(20)

      cache.set(keys.two(), "b")

      expect(evictions).toStrictEqual([{ key: "1", value: "a", reason: "capacity" }])
    })
  })

  describe("memory bound", () => {
    it("keeps memoryUsed within the limit after every successful write", () => {
      const { cache } = createTestCache({ memoryLimit: 100 })
      const used: number[] = []

      for (const [key, value] of [
        ["1", "a"],
        ["2", "b"],
        ["3", "c"],
        ["4", ALPHABET],
      ] as const) {
        expect(cache.set(key, value)).toStrictEqual({ ok: true })
        used.push(cache.memoryUsed())
      }

      expect(used).toStrictEqual([42, 84, 84, 67])
      expect(cache.size()).toBe(1)
    })

    it("evicts as many oldest entries as needed, each with reason memory", () => {
      const { cache } = createTestCache({ memoryLimit: 130 })
      const evictions = recordEvictions(cache)
      cache.set(keys.one(), "a")
      cache.set(keys.two(), "b")
      cache.set(keys.three(), "c")

      cache.set(keys.four(), ALPHABET)

      expect(evictions).toStrictEqual([
        { key: "1", value: "a", reason: "memory" },
        { key: "2", value: "b", reason: "memory" },
      ])
      expect(cache.memoryUsed()).toBe(SMALL_ENTRY_BYTES + ALPHABET_ENTRY_BYTES)
    })

    it("growing an existing entry never evicts the entry being written", () => {
      const { cache } = createTestCache({ memoryLimit: 100 })
      const evictions = recordEvictions(cache)
      cache.set(keys.one(), "a")
      cache.set(keys.two(), "b")

      cache.set(keys.one(), ALPHABET)

      expect(evictions).toStrictEqual([{ key: "2", value: "b", reason: "memory" }])
      expect(cache.get(keys.one())).toStrictEqual({ kind: "hit", value: ALPHABET })
      expect(cache.memoryUsed()).toBe(ALPHABET_ENTRY_BYTES)
    })

    it("applies the capacity step before the memory step", () => {
      const { cache } = createTestCache({ capacity: 2, memoryLimit: 100 })
      const evictions = recordEvictions(cache)
      cache.set(keys.one(), "a")
      cache.set(keys.two(), "b")

      cache.set(keys.three(), ALPHABET)

      expect(evictions).toStrictEqual([
        { key: "1", value: "a", reason: "capacity" },
        { key: "2", value: "b", reason: "memory" },
      ])
    })

    it("rejects an entry larger than the limit on an empty cache", () => {
      const { cache } = createTestCache({ memoryLimit: 100 })

      const res = cache.set("big", "x".repeat(100))

      expect(res.ok).toBe(false)
      if (res.ok) return

      expect(isCacheError(res.error, "policy_exhausted")).toBe(true)
      expect(res.error.context).toStrictEqual({
        key: "big",
        reason: "memory",
        requiredBytes: 143,
        memoryLimit: 100,
        capacity: 0,
      })
      expect(cache.size()).toBe(0)
    })

    it("a rejected write leaves every existing entry in place", () => {
      const { cache } = createTestCache({ memoryLimit: 100 })
      const evictions = recordEvictions(cache)
      cache.set(keys.one(), "a")
      cache.set(keys.two(), "b")

      const res = cache.set("big", "x".repeat(100))

      expect(res.ok).toBe(false)
      expect(evictions).toStrictEqual([])
      expect(cache.size()).toBe(2)
      expect(cache.memoryUsed()).toBe(2 * SMALL_ENTRY_BYTES)
      expect(cache.get(keys.one())).toStrictEqual({ kind: "hit", value: "a" })
    })

    it("a rejected overwrite keeps the previous value", () => {
      const { cache } = createTestCache({ memoryLimit: 100 })
      cache.set(keys.one(), "a")

      const res = cache.set(keys.one(), "x".repeat(100))

      expect(res.ok).toBe(false)
      expect(cache.get(keys.one())).toStrictEqual({ kind: "hit", value: "a" })
      expect(cache.memoryUsed()).toBe(SMALL_ENTRY_BYTES)
    })
  })

  describe("policy refusal", () => {
    class RefusingPolicy extends FifoEvictionPolicy<string> {
      refuse: string | undefined

      track(key: string): boolean {
        if (key === this.refuse) {
          this.refuse = undefined
          return false
        }

        return super.track(key)
      }
    }

    it("undoes planned evictions when the policy refuses the new key", () => {
      const policy = new RefusingPolicy()
      const { cache } = createTestCache({ memoryLimit: 100 }, { policy })
      const evictions = recordEvictions(cache)
      cache.set(keys.one(), "a")
      cache.set(keys.two(), "b")
      policy.refuse = "bad"

      const res = cache.set("bad", "x")

      expect(res.ok).toBe(false)
      if (res.ok) return

      expect(isCacheError(res.error, "policy_exhausted")).toBe(true)
      expect(res.error.context).toMatchObject({ key: "bad", reason: "rejected" })
      expect(evictions).toStrictEqual([])
      expect(cache.size()).toBe(2)
      expect(cache.memoryUsed()).toBe(2 * SMALL_ENTRY_BYTES)
      expect(cache.has("bad")).toBe(false)
      expect([...policy.candidates()]).toStrictEqual(["1", "2"])
    })

    it("keeps the eviction order when a refused overwrite had evicted entries", () => {
      const policy = new RefusingPolicy()
      const { cache } = createTestCache({ memoryLimit: 150 }, { policy })
      const evictions = recordEvictions(cache)
      cache.set(keys.one(), "a")
      cache.set(keys.two(), "b")
      cache.set(keys.three(), "c")
      policy.refuse = keys.one()

      const res = cache.set(keys.one(), "x".repeat(30))

      expect(res.ok).toBe(false)
      expect(evictions).toStrictEqual([])
      expect(cache.get(keys.one())).toStrictEqual({ kind: "hit", value: "a" })
      expect(cache.get(keys.two())).toStrictEqual({ kind: "hit", value: "b" })
      expect(cache.memoryUsed()).toBe(3 * SMALL_ENTRY_BYTES)
      expect([...policy.candidates()]).toStrictEqual(["1", "2", "3"])
    })

    it("a bounded policy refuses keys beyond its bound", () => {
      const policy = new FifoEvictionPolicy<string>({ maxKeys: 2 })
      const { cache } = createTestCache({}, { policy })
      cache.set(keys.one(), "a")
      cache.set(keys.two(), "b")

      const res = cache.set(keys.three(), "c")

      expect(res.ok).toBe(false)
      expect(cache.size()).toBe(2)
      expect(policy.count()).toBe(2)
    })
  })

  describe("deeply nested values", () => {
    type Link = { next: Link | null }

    it("stores a 50k-deep chain and charges its full size", () => {
      const { cache } = createTestCache<Link | null>({ memoryLimit: 10_000_000 })
      let chain: Link | null = null
      for (let i = 0; i < 50_000; i++) chain = { next: chain }

      expect(cache.set("k", chain)).toStrictEqual({ ok: true })

      // 17 (key) + 50k * (8 pointer + 16 header) + 8 (null) + 8 (slot)
      expect(cache.memoryUsed()).toBe(17 + 50_000 * 24 + 8 + 8)
    })
  })

  describe("initial entries", () => {
    it("writes seeds in order through the bounded write path", () => {
      const clock = new FakeClock(1_000)
      const policy = new FifoEvictionPolicy<string>()
      const cache = createBoundedCache<string>(
        {
          memoryLimit: 100,
          capacity: 2,
          initial: [
            { key: "1", value: "a" },
            { key: "2", value: "b", ttl: 10 },
            { key: "3", value: "c" },
          ],
        },
        { clock, policy },
      )

      expect(cache.has(keys.one())).toBe(false)
      expect(cache.size()).toBe(2)
      expect(cache.memoryUsed()).toBe(2 * SMALL_ENTRY_BYTES)
      expect([...policy.candidates()]).toStrictEqual(["2", "3"])

      clock.advance(10)

      expect(cache.has(keys.two())).toBe(false)
      expect(cache.get(keys.three())).toStrictEqual({ kind: "hit", value: "c" })
    })

    it("skips and logs a seed that cannot fit", () => {
      const { logger, records } = captureLogs()
      const cache = createBoundedCache<string>(
        { memoryLimit: 100, initial: [{ key: "big", value: "x".repeat(100) }] },
        { clock: new FakeClock(1_000), logger },
      )

      expect(cache.size()).toBe(0)
      expect(records().map((r) => r.msg)).toStrictEqual([
        "write rejected: eviction policy exhausted",
      ])
    })
  })

  describe("eviction listener", () => {
    it("runs after the write that evicted the entry is applied", () => {
      const { cache } = createTestCache({ capacity: 1 })
      const seen: { has: boolean; size: number; newKey: boolean }[] = []
      cache.setEvictionListener((key) => {
        seen.push({ has: cache.has(key), size: cache.size(), newKey: cache.has(keys.two()) })
      })
      cache.set(keys.one(), "a")

      cache.set(keys.two(), "b")

      expect(seen).toStrictEqual([{ has: false, size: 1, newKey: true }])
    })

    it("may write to the cache from inside a notification", () => {
      const { cache } = createTestCache({ capacity: 2 })
      cache.setEvictionListener((key, value, reason) => {
        if (reason === "capacity") cache.delete(keys.three())
        if (reason === "removed") cache.set(`moved:${key}`, value)
      })
      cache.set(keys.one(), "a")
      cache.set(keys.two(), "b")

      cache.set(keys.three(), "c")

      expect(cache.has(keys.two())).toBe(true)
      expect(cache.has(keys.three())).toBe(false)
      expect(cache.get("moved:3")).toStrictEqual({ kind: "hit", value: "c" })
    })

    it("keeps notifying after a listener throws and logs the failure", () => {
      const { logger, records } = captureLogs()
      const { cache, clock } = createTestCache({}, { logger })
      const notified: string[] = []
      cache.setEvictionListener((key) => {
        notified.push(key)
        if (key === "1") throw new Error("boom")
      })
      cache.set(keys.one(), "a", 10)
      cache.set(keys.two(), "b", 10)
      clock.advance(10)

      expect(cache.deleteExpired()).toBe(2)

      expect(notified).toStrictEqual(["1", "2"])
      expect(records().filter((r) => r.msg === "eviction listener failed")).toMatchObject([
        {
          level: 50,
          module: "cache",
          cache: "test",
          key: "1",
          reason: "expired",
          err: { type: "Error", message: "boom" },
        },
      ])
    })
  })

  describe("logging", () => {
    it("logs each eviction at debug level with its size", () => {
      const { logger, records } = captureLogs()
      const { cache } = createTestCache({ capacity: 1 }, { logger })
      cache.set(keys.one(), "a")

      cache.set(keys.two(), "b")

      expect(records().filter((r) => r.msg === "entry evicted")).toMatchObject([
        { level: 20, module: "cache", cache: "test", key: "1", reason: "capacity", bytes: 42 },
      ])
    })

    it("logs rejected writes at warn level", () => {
      const { logger, records } = captureLogs()
      const { cache } = createTestCache({ memoryLimit: 100 }, { logger })

      cache.set("big", "x".repeat(100))

      expect(
        records().filter((r) => r.msg === "write rejected: eviction policy exhausted"),
      ).toMatchObject([{ level: 40, key: "big", reason: "memory", bytes: 143 }])
    })
  })
})
