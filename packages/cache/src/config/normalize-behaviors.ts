import type { ClientBehaviors } from "../ports/node-client"
import type { ClusterOptions } from "./params-schema"

const RESERVED_OPTIONS = new Set(["IGNORE_CLUSTER_ERRORS", "behaviors"])

/**
 * Flatten framework `OPTIONS` into client behaviors.
 *
 * A nested `behaviors` map wins. Without one, every other top-level option
 * is a behavior.
 */
export function normalizeBehaviors(options: ClusterOptions | undefined): ClientBehaviors {
  if (!options) return Object.freeze({})

  if (options.behaviors) return Object.freeze({ ...options.behaviors })

  return Object.freeze(
    Object.fromEntries(Object.entries(options).filter(([key]) => !RESERVED_OPTIONS.has(key))),
  )
}
