import type { Clock, Milliseconds } from "@boundcache/clock"
import type { Logger } from "@boundcache/logger"

/** Anything that can drop its expired entries on demand. */
export interface ExpirationTarget {
  deleteExpired(): number
}

export type ExpirationSweeperDeps = {
  clock: Clock
  logger: Logger
}

export type ExpirationSweeperOptions = {
  intervalMs: Milliseconds
}

/**
 * Calls `target.deleteExpired()` every `intervalMs` until stopped.
 *
 * Each sweep runs only after the previous one returned. A sweep that throws is
 * logged and the loop keeps going.
 */
export class ExpirationSweeper {
  private controller: AbortController | undefined
  private loop: Promise<void> | undefined

  constructor(
    private readonly target: ExpirationTarget,
    private readonly deps: ExpirationSweeperDeps,
    private readonly opts: ExpirationSweeperOptions,
  ) {
    if (!(opts.intervalMs > 0)) {
      throw new RangeError(`intervalMs must be greater than zero, got ${opts.intervalMs}`)
    }
  }

  isRunning(): boolean {
    return this.loop !== undefined
  }

  start(): void {
    if (this.loop) return

    const controller = new AbortController()

    this.controller = controller
    this.loop = this.run(controller.signal)

    this.deps.logger.info("expiration sweeper started", { durationMs: this.opts.intervalMs })
  }

  /** Abort the pending sleep and wait for the loop to exit. */
  async stop(): Promise<void> {
    const loop = this.loop
    if (!loop) return

    this.controller?.abort()
    this.controller = undefined
    this.loop = undefined

    await loop

    this.deps.logger.info("expiration sweeper stopped")
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.deps.clock.sleep(this.opts.intervalMs, signal)

      if (signal.aborted) return

      this.sweep()
    }
  }

  private sweep(): void {
    try {
      const count = this.target.deleteExpired()

      if (count > 0) this.deps.logger.debug("expired entries swept", { count })
    } catch (err) {
      this.deps.logger.error("expiration sweep failed", { err })
    }
  }
}
