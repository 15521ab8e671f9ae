import type { Milliseconds } from "./time"

export type TimeSource = {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}

export interface Sleeper {
  /**
   * Delay execution for `ms` milliseconds.
   *
   * Resolves early (never rejects) if `signal` is aborted, so background loops can
   * use the signal as their only stop condition.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
