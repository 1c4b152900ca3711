import type { Logger } from "@discache/logger"
import { createNullLogger } from "@discache/logger"
import type { Singleflight } from "@discache/singleflight"
import { MemorySingleflight } from "@discache/singleflight"
import type { ClientStorage } from "../../ports/client-storage"
import type { ClientBehaviors, NodeClient, NodeClientFactory } from "../../ports/node-client"
import type { MembershipCache } from "../membership/membership-cache"
import { InstanceClientStorage } from "./client-storage"
import { NoNodesClient } from "./no-nodes-client"

export type NodeClientCacheDeps<T> = {
  membership: MembershipCache
  factory: NodeClientFactory<T>
  storage?: ClientStorage<NodeClient<T>>
  logger?: Logger
  flights?: Singleflight<NodeClient<T>>
}

export type NodeClientCacheOptions = {
  /** Applied once, when a client is built. */
  behaviors: ClientBehaviors
}

/**
 * Keeps the node client built from the current membership.
 *
 * A stored client is only handed out while the membership generation it was
 * built from is current, so an invalidation made anywhere is seen by every
 * storage slot on its next read.
 */
export class NodeClientCache<T> {
  private readonly membership: MembershipCache
  private readonly factory: NodeClientFactory<T>
  private readonly storage: ClientStorage<NodeClient<T>>
  private readonly logger: Logger
  private readonly flights: Singleflight<NodeClient<T>>

  constructor(
    deps: NodeClientCacheDeps<T>,
    private readonly opts: NodeClientCacheOptions,
  ) {
    this.membership = deps.membership
    this.factory = deps.factory
    this.storage = deps.storage ?? new InstanceClientStorage<NodeClient<T>>()
    this.flights = deps.flights ?? new MemorySingleflight<NodeClient<T>>()
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "client" })
  }

  async getClient(): Promise<NodeClient<T>> {
    const stored = this.peek()
    if (stored) return stored

    const generation = this.membership.generation
    const key = `client:${this.storage.slotId()}:${generation}`
    const { value: client } = await this.flights.run(key, () => this.build(generation))

    if (generation === this.membership.generation) {
      this.storage.set({ client, generation })
    }

    return client
  }

  /**
   * The stored client, if it was built for the current membership.
   */
  peek(): NodeClient<T> | undefined {
    const stored = this.storage.get()

    return stored?.generation === this.membership.generation ? stored.client : undefined
  }

  /**
   * Drop the stored client. Its connections are not closed here.
   */
  invalidate(): void {
    this.storage.clear()
  }

  /**
   * Run `fn` with a client slot of its own, where the storage has any.
   */
  runInScope<R>(fn: () => R): R {
    return this.storage.run(fn)
  }

  private async build(generation: number): Promise<NodeClient<T>> {
    const nodes = await this.membership.getNodes()

    this.logger.debug("building node client", { generation, nodeCount: nodes.length })

    if (nodes.length === 0) {
      return new NoNodesClient<T>(this.membership.endpoint)
    }

    return this.factory.create(nodes, this.opts.behaviors)
  }
}
