export { FakeClock } from "./adapters/fake-clock"
export { MAX_TIMER_DELAY_MS, SystemClock, type SystemClockOptions } from "./adapters/system-clock"
export type { Clock, Sleeper, TimeSource } from "./ports/clock"
export type * from "./ports/time"
