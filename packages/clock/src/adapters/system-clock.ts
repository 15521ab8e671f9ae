import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

/** Largest delay a single Node.js timer honours; longer delays fire after 1 ms. */
export const MAX_TIMER_DELAY_MS: Milliseconds = 2 ** 31 - 1

export type SystemClockOptions = {
  /**
   * Whether pending sleeps keep the Node.js event loop alive.
   *
   * Background loops (e.g. a cache sweeper) pass `false` so an idle process can exit
   * even if nobody stopped the loop.
   *
   * Default: `true`.
   */
  keepAlive: boolean
}

export class SystemClock implements Clock {
  private readonly opts: SystemClockOptions

  constructor(opts: Partial<SystemClockOptions> = {}) {
    this.opts = { keepAlive: opts.keepAlive ?? true }
  }

  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) return Promise.resolve()
    if (signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      let remaining = ms
      let timer: ReturnType<typeof setTimeout> | undefined

      const onAbort = () => {
        clearTimeout(timer)
        resolve()
      }

      // Long sleeps run as a chain of timers, each within the platform limit.
      const schedule = () => {
        const delay = Math.min(remaining, MAX_TIMER_DELAY_MS)
        remaining -= delay

        timer = setTimeout(() => {
          if (remaining > 0) {
            schedule()
          } else {
            signal?.removeEventListener("abort", onAbort)
            resolve()
          }
        }, delay)

        if (!this.opts.keepAlive) timer.unref()
      }

      schedule()
      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }
}
