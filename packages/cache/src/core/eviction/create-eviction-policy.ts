import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import { FIFO_POLICY_ALIASES } from "../../ports/cache-eviction-policy"
import { CacheConfigError } from "../errors/errors"
import type { EvictionPolicy } from "./eviction-policy"
import { FifoEvictionPolicy } from "./fifo-eviction-policy"

/**
 * Resolve a configured policy name to its canonical kind.
 *
 * @throws CacheConfigError `unsupported_eviction_policy` for unknown names.
 */
export function resolveEvictionPolicyKind(name: string | undefined): CacheEvictionPolicy {
  const normalized = (name ?? "").trim().toLowerCase()

  if (FIFO_POLICY_ALIASES.includes(normalized)) return "fifo"

  throw new CacheConfigError(
    "unsupported_eviction_policy",
    `Unsupported eviction policy "${name}"`,
    { context: { evictionPolicy: name, supported: ["fifo"] } },
  )
}

export function createEvictionPolicy<K>(name?: string): EvictionPolicy<K> {
  const kind = resolveEvictionPolicyKind(name)

  switch (kind) {
    case "fifo":
      return new FifoEvictionPolicy<K>()
  }
}
