import type { ConfigSource } from "../../ports/config-source"

/** In-code overrides, usually listed last so they win over the environment. */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly values: Record<string, unknown>,
    readonly name: string = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
