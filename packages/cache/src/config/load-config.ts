import { z } from "zod"
import { ConfigurationError } from "../errors/cache-errors"
import type { ClusterCacheParams } from "./params-schema"

export const DEFAULT_ENV_PREFIX = "DISCACHE_"

const BEHAVIOR_PREFIX = "BEHAVIOR_"

const envSchema = z.object({
  ENDPOINT: z.string().min(1),
  DISCOVERY_TIMEOUT: z.coerce.number().positive().optional(),
  IGNORE_CLUSTER_ERRORS: z.stringbool().optional(),
  CLIENT_SCOPE: z.enum(["instance", "context"]).optional(),
  DEFAULT_TTL: z.coerce.number().int().nonnegative().optional(),
})

export type LoadClusterCacheConfigOptions = {
  /** @default process.env */
  env?: Record<string, string | undefined>

  /** @default "DISCACHE_" */
  prefix?: string
}

export type ClusterCacheEnvConfig = Readonly<{
  location: string
  params: ClusterCacheParams
}>

/**
 * Read cluster cache settings from prefixed environment variables.
 *
 * `<prefix>BEHAVIOR_<NAME>` variables become client behaviors, with `NAME`
 * camel-cased: `DISCACHE_BEHAVIOR_POOL_SIZE=10` is `{ poolSize: 10 }`.
 *
 * @throws {ConfigurationError} when a variable is missing or malformed.
 */
export function loadClusterCacheConfig(
  options: LoadClusterCacheConfigOptions = {},
): ClusterCacheEnvConfig {
  const prefix = options.prefix ?? DEFAULT_ENV_PREFIX
  const vars = stripPrefix(options.env ?? process.env, prefix)

  const parsed = envSchema.safeParse(vars)

  if (!parsed.success) {
    throw new ConfigurationError(
      `Cluster cache environment validation failed:\n${z.prettifyError(parsed.error)}`,
      { prefix },
      parsed.error,
    )
  }

  const { ENDPOINT, DISCOVERY_TIMEOUT, IGNORE_CLUSTER_ERRORS, CLIENT_SCOPE, DEFAULT_TTL } =
    parsed.data

  return Object.freeze({
    location: ENDPOINT,
    params: {
      ...(DISCOVERY_TIMEOUT !== undefined && { DISCOVERY_TIMEOUT }),
      ...(DEFAULT_TTL !== undefined && { TIMEOUT: DEFAULT_TTL }),
      ...(CLIENT_SCOPE !== undefined && { CLIENT_SCOPE }),
      OPTIONS: {
        ...(IGNORE_CLUSTER_ERRORS !== undefined && { IGNORE_CLUSTER_ERRORS }),
        behaviors: readBehaviors(vars),
      },
    },
  })
}

function stripPrefix(
  env: Record<string, string | undefined>,
  prefix: string,
): Record<string, string> {
  const out: Record<string, string> = {}

  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && key.startsWith(prefix)) {
      out[key.slice(prefix.length)] = value
    }
  }

  return out
}

function readBehaviors(vars: Record<string, string>): Record<string, unknown> {
  const behaviors: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(vars)) {
    if (key.startsWith(BEHAVIOR_PREFIX) && key.length > BEHAVIOR_PREFIX.length) {
      behaviors[camelCase(key.slice(BEHAVIOR_PREFIX.length))] = coerce(value)
    }
  }

  return behaviors
}

function camelCase(name: string): string {
  return name
    .toLowerCase()
    .replace(/_+([a-z0-9])/g, (_, c: string) => c.toUpperCase())
}

function coerce(value: string): unknown {
  const trimmed = value.trim()

  if (trimmed === "true") return true
  if (trimmed === "false") return false
  if (trimmed !== "" && Number.isFinite(Number(trimmed))) return Number(trimmed)

  return value
}
