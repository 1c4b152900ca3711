import type { Logger } from "@discache/logger"
import { createNullLogger } from "@discache/logger"
import type { ZodType } from "zod"
import {
  MemcachedNodeClientFactory,
  parseMemcachedBehaviors,
} from "./adapters/memcached/memcached-node-client-factory"
import type { ClusterCacheParams, ClusterCacheSettings } from "./config/params-schema"
import { parseClusterCacheParams } from "./config/params-schema"
import { createClientStorage } from "./core/client/client-storage"
import { NodeClientCache } from "./core/client/node-client-cache"
import { SocketClusterDiscovery } from "./core/discovery/socket-discovery"
import { parseLocation } from "./core/endpoint/parse-location"
import { type CacheState, SelfHealingCache } from "./core/healing/self-healing-cache"
import { MembershipCache } from "./core/membership/membership-cache"
import type { Clock } from "./core/time/clock"
import type { CacheBackend } from "./ports/cache-backend"
import type { CacheEntry } from "./ports/cache-entry"
import type { CacheKey } from "./ports/cache-key"
import type { CacheSetOptions } from "./ports/cache-options"
import type { CacheResult } from "./ports/cache-result"
import type { ClusterDiscovery } from "./ports/cluster-discovery"
import type { ConfigurationEndpoint, NodeList } from "./ports/cluster-node"
import { formatNode } from "./ports/cluster-node"
import type { NodeClient, NodeClientFactory } from "./ports/node-client"

type ClusterCacheCommonDeps = {
  logger?: Logger
  clock?: Clock

  /** @default SocketClusterDiscovery */
  discovery?: ClusterDiscovery
}

/**
 * Either a ready node client factory, or the schema values are validated
 * against when read back from memcached.
 */
export type ClusterCacheDeps<T> = ClusterCacheCommonDeps &
  ({ factory: NodeClientFactory<T> } | { valueSchema: ZodType<T> })

/**
 * A cache in front of an auto-discovered memcached cluster.
 *
 * Membership is discovered on first use and kept until an operation fails.
 * A failed operation rejects with its own error and leaves the cache cold,
 * so the next operation discovers the cluster again.
 */
export class ClusterCache<T> implements CacheBackend<T> {
  private readonly healing: SelfHealingCache<T>

  constructor(
    readonly endpoint: ConfigurationEndpoint,
    private readonly settings: ClusterCacheSettings,
    private readonly membership: MembershipCache,
    private readonly clients: NodeClientCache<T>,
    logger: Logger,
  ) {
    this.healing = new SelfHealingCache({ membership, clients, logger })
  }

  get(key: CacheKey): Promise<CacheResult<T>> {
    return this.healing.get(key)
  }

  getMany(keys: readonly CacheKey[]): Promise<Map<CacheKey, CacheResult<T>>> {
    return this.healing.getMany(keys)
  }

  set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<boolean> {
    return this.healing.set(key, value, this.withDefaults(opts))
  }

  setMany(
    entries: readonly CacheEntry<T>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<CacheKey[]> {
    return this.healing.setMany(entries, this.withDefaults(opts))
  }

  delete(key: CacheKey): Promise<boolean> {
    return this.healing.delete(key)
  }

  /**
   * Forget the cluster nodes. The next operation discovers them again.
   */
  invalidate(): void {
    this.healing.invalidate()
  }

  state(): CacheState {
    return this.healing.state()
  }

  /** Current membership, or undefined while cold. */
  nodes(): NodeList | undefined {
    return this.membership.snapshot()?.nodes
  }

  /**
   * Run `fn` with a node client of its own when the cache was created with
   * `CLIENT_SCOPE: "context"`. Without it, `fn` just runs.
   */
  runInScope<R>(fn: () => R): R {
    return this.clients.runInScope(fn)
  }

  /**
   * Close the current node client and go cold.
   */
  async close(): Promise<void> {
    const client: NodeClient<T> | undefined = this.clients.peek()

    this.healing.invalidate()
    await client?.close()
  }

  private withDefaults(opts?: Partial<CacheSetOptions>): Partial<CacheSetOptions> | undefined {
    const defaultTtl = this.settings.defaultTtl

    if (opts?.ttl !== undefined || defaultTtl === undefined) return opts

    return { ...opts, ttl: defaultTtl }
  }
}

/**
 * Build a cluster cache from a framework-style location and parameters.
 *
 * @param location - The configuration endpoint as `host:port`. Lists are
 *   accepted but must name exactly one server.
 *
 * @throws {ConfigurationError} before any network call, when the location or
 *   the parameters are unusable.
 *
 * @example
 * ```ts
 * const cache = createClusterCache(
 *   "sessions.abc123.cfg.use1.cache.amazonaws.com:11211",
 *   { DISCOVERY_TIMEOUT: 2, TIMEOUT: 300, OPTIONS: { behaviors: { timeout: 500 } } },
 *   { valueSchema: z.string() },
 * )
 *
 * await cache.set("session:42", "payload")
 * ```
 */
export function createClusterCache<T>(
  location: string | readonly string[],
  params: ClusterCacheParams | undefined,
  deps: ClusterCacheDeps<T>,
): ClusterCache<T> {
  const endpoint = parseLocation(location)
  const settings = parseClusterCacheParams(params)
  const logger = (deps.logger ?? createNullLogger()).child({
    module: "cluster-cache",
    endpoint: formatNode(endpoint),
  })

  const factory = "factory" in deps ? deps.factory : memcachedFactory(deps, settings, logger)

  const membership = new MembershipCache(
    {
      discovery: deps.discovery ?? new SocketClusterDiscovery({}, { logger }),
      logger,
      ...(deps.clock !== undefined && { clock: deps.clock }),
    },
    {
      endpoint,
      ignoreClusterErrors: settings.ignoreClusterErrors,
      ...(settings.discoveryTimeoutMs !== undefined && {
        discoveryTimeoutMs: settings.discoveryTimeoutMs,
      }),
    },
  )

  const clients = new NodeClientCache<T>(
    { membership, factory, logger, storage: createClientStorage(settings.clientScope) },
    { behaviors: settings.behaviors },
  )

  logger.debug("cluster cache created", {
    clientScope: settings.clientScope,
    ignoreClusterErrors: settings.ignoreClusterErrors,
  })

  return new ClusterCache(endpoint, settings, membership, clients, logger)
}

function memcachedFactory<T>(
  deps: ClusterCacheCommonDeps & { valueSchema: ZodType<T> },
  settings: ClusterCacheSettings,
  logger: Logger,
): MemcachedNodeClientFactory<T> {
  parseMemcachedBehaviors(settings.behaviors)

  return new MemcachedNodeClientFactory(
    { valueSchema: deps.valueSchema },
    { logger, ...(deps.clock !== undefined && { clock: deps.clock }) },
  )
}
