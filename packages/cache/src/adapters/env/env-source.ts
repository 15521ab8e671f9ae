import type { ConfigSource } from "../../ports/config-source"

const CACHE_KEY_PREFIX = "CACHE_"

export type EnvSourceOptions = {
  /**
   * Service prefix stripped before matching, e.g. `"BILLING_"` reads
   * `BILLING_CACHE_MEMORY_LIMIT` as `CACHE_MEMORY_LIMIT`.
   */
  prefix?: string
  env?: Record<string, string | undefined>
}

/** Reads the `CACHE_*` variables, optionally under a service prefix. */
export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
    this.name = this.prefix ? `env:${this.prefix}` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    const picked: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (!key.startsWith(this.prefix)) continue

      const unprefixed = key.slice(this.prefix.length)

      if (unprefixed.startsWith(CACHE_KEY_PREFIX)) picked[unprefixed] = value
    }

    return picked
  }
}
