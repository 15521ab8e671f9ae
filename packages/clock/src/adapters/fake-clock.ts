import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

type PendingSleep = {
  wakeAtMs: Milliseconds
  resolve: () => void
}

/**
 * Manually driven clock for tests.
 *
 * `sleep()` does not touch real timers: each call parks until `advance()` or `set()`
 * moves time past its wake-up instant, or until its signal aborts.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  private readonly pending = new Set<PendingSleep>()

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.set(this.time + ms)
  }

  set(ms: Milliseconds): void {
    this.time = ms
    this.wakeDueSleepers()
  }

  /** Number of sleeps still waiting for time to pass. */
  pendingSleeps(): number {
    return this.pending.size
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) return Promise.resolve()
    if (signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const sleeper: PendingSleep = {
        wakeAtMs: this.time + ms,
        resolve: () => {
          this.pending.delete(sleeper)
          signal?.removeEventListener("abort", sleeper.resolve)
          resolve()
        },
      }

      this.pending.add(sleeper)
      signal?.addEventListener("abort", sleeper.resolve, { once: true })
    })
  }

  private wakeDueSleepers(): void {
    const due = [...this.pending]
      .filter((s) => s.wakeAtMs <= this.time)
      .sort((a, b) => a.wakeAtMs - b.wakeAtMs)

    for (const sleeper of due) sleeper.resolve()
  }
}
