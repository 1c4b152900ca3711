import { z } from "zod"
import { ConfigurationError } from "../errors/cache-errors"
import type { CacheTtl } from "../ports/cache-options"
import type { ClientScope } from "../ports/client-storage"
import type { ClientBehaviors } from "../ports/node-client"
import type { Milliseconds } from "../ports/time"
import { normalizeBehaviors } from "./normalize-behaviors"

export const clusterOptionsSchema = z.looseObject({
  IGNORE_CLUSTER_ERRORS: z.boolean().optional(),
  behaviors: z.record(z.string(), z.unknown()).optional(),
})

export type ClusterOptions = z.infer<typeof clusterOptionsSchema>

/**
 * Parameters in the shape cache frameworks pass to a backend. Keys this
 * client does not use are dropped.
 */
export const clusterCacheParamsSchema = z.object({
  /** Seconds. `null` uses the transport's default. */
  DISCOVERY_TIMEOUT: z.number().positive().nullable().optional(),

  /** Default entry lifetime in seconds. `null` means entries do not expire. */
  TIMEOUT: z.number().nonnegative().nullable().optional(),

  CLIENT_SCOPE: z.enum(["instance", "context"]).optional(),

  OPTIONS: clusterOptionsSchema.optional(),
})

export type ClusterCacheParams = z.input<typeof clusterCacheParamsSchema>

export type ClusterCacheSettings = Readonly<{
  discoveryTimeoutMs?: Milliseconds
  defaultTtl?: CacheTtl
  ignoreClusterErrors: boolean
  clientScope: ClientScope
  behaviors: ClientBehaviors
}>

/**
 * @throws {ConfigurationError} when `params` does not match the schema.
 */
export function parseClusterCacheParams(params: unknown): ClusterCacheSettings {
  const parsed = clusterCacheParamsSchema.safeParse(params ?? {})

  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid cluster cache parameters:\n${z.prettifyError(parsed.error)}`,
      {},
      parsed.error,
    )
  }

  const { DISCOVERY_TIMEOUT, TIMEOUT, CLIENT_SCOPE, OPTIONS } = parsed.data

  return Object.freeze({
    ...(DISCOVERY_TIMEOUT !== undefined &&
      DISCOVERY_TIMEOUT !== null && { discoveryTimeoutMs: DISCOVERY_TIMEOUT * 1000 }),
    ...(TIMEOUT !== undefined &&
      TIMEOUT !== null && { defaultTtl: { kind: "seconds", seconds: TIMEOUT } as const }),
    ignoreClusterErrors: OPTIONS?.IGNORE_CLUSTER_ERRORS ?? false,
    clientScope: CLIENT_SCOPE ?? "instance",
    behaviors: normalizeBehaviors(OPTIONS),
  })
}
