import type { Logger } from "@discache/logger"
import { createNullLogger } from "@discache/logger"
import type { Singleflight } from "@discache/singleflight"
import { MemorySingleflight } from "@discache/singleflight"
import { ClusterConnectionError, DiscoveryConnectivityError } from "../../errors/cache-errors"
import type { ClusterDiscovery } from "../../ports/cluster-discovery"
import type { ClusterConfig, ConfigurationEndpoint, NodeList } from "../../ports/cluster-node"
import { formatNode } from "../../ports/cluster-node"
import type { Milliseconds } from "../../ports/time"
import type { Clock } from "../time/clock"
import { SystemClock } from "../time/clock"

export type MembershipSnapshot = Readonly<{
  nodes: NodeList
  version: number
  degraded: boolean
  discoveredAt: Date

  /** Generation that was current when the discovery started. */
  generation: number
}>

export type MembershipCacheOptions = {
  endpoint: ConfigurationEndpoint
  discoveryTimeoutMs?: Milliseconds
  ignoreClusterErrors: boolean
}

export type MembershipCacheDeps = {
  discovery: ClusterDiscovery
  clock?: Clock
  logger?: Logger
  flights?: Singleflight<ClusterConfig>
}

/**
 * Holds the node list of one cluster between discoveries.
 *
 * The snapshot has no expiry: it stays until `invalidate()`. Each
 * invalidation starts a new generation. A discovery started under an older
 * generation still answers its own callers but never becomes the snapshot.
 */
export class MembershipCache {
  private readonly discovery: ClusterDiscovery
  private readonly clock: Clock
  private readonly logger: Logger
  private readonly flights: Singleflight<ClusterConfig>

  private current: MembershipSnapshot | undefined
  private gen = 0

  constructor(
    deps: MembershipCacheDeps,
    private readonly opts: MembershipCacheOptions,
  ) {
    this.discovery = deps.discovery
    this.clock = deps.clock ?? new SystemClock()
    this.flights = deps.flights ?? new MemorySingleflight<ClusterConfig>()
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "membership",
      endpoint: formatNode(opts.endpoint),
    })
  }

  get endpoint(): ConfigurationEndpoint {
    return this.opts.endpoint
  }

  get generation(): number {
    return this.gen
  }

  snapshot(): MembershipSnapshot | undefined {
    return this.current
  }

  async getNodes(): Promise<NodeList> {
    const cached = this.current
    if (cached) return cached.nodes

    const generation = this.gen
    const { value: config } = await this.flights.run(flightKey(generation), () =>
      this.discover(generation),
    )

    if (generation !== this.gen) {
      return config.nodes
    }

    if (!this.current) {
      this.current = Object.freeze({
        nodes: config.nodes,
        version: config.version,
        degraded: config.degraded,
        discoveredAt: this.clock.now(),
        generation,
      })
    }

    return this.current.nodes
  }

  /**
   * Forget the cached node list. The next `getNodes()` discovers again.
   */
  invalidate(): void {
    this.flights.forget(flightKey(this.gen))
    this.current = undefined
    this.gen++
  }

  private async discover(generation: number): Promise<ClusterConfig> {
    const startedAt = this.clock.nowMs()
    this.logger.debug("discovering cluster nodes", { generation })

    try {
      const config = await this.discovery.discover({
        endpoint: this.opts.endpoint,
        ignoreClusterErrors: this.opts.ignoreClusterErrors,
        ...(this.opts.discoveryTimeoutMs !== undefined && {
          timeoutMs: this.opts.discoveryTimeoutMs,
        }),
      })

      this.logger.debug("discovered cluster nodes", {
        generation,
        nodeCount: config.nodes.length,
        configVersion: config.version,
        degraded: config.degraded,
        durationMs: this.clock.nowMs() - startedAt,
      })

      return config
    } catch (err) {
      if (err instanceof DiscoveryConnectivityError) {
        this.logger.error("cannot connect to cluster", { generation, err })
        throw new ClusterConnectionError(this.opts.endpoint, err)
      }

      throw err
    }
  }
}

function flightKey(generation: number): string {
  return `discovery:${generation}`
}
