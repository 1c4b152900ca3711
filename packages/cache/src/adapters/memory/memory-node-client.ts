import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { CacheNode, NodeList } from "../../ports/cluster-node"
import type { ClientBehaviors, NodeClient, NodeClientFactory } from "../../ports/node-client"
import type { MemoryCluster } from "./memory-cluster"

/**
 * A node client over a `MemoryCluster`. Keys are spread over the node list
 * by a hash of the key, so the same list always routes a key to the same
 * node.
 */
export class MemoryNodeClient<T> implements NodeClient<T> {
  private closed = false

  constructor(
    private readonly cluster: MemoryCluster<T>,
    readonly nodes: NodeList,
  ) {
    if (nodes.length === 0) {
      throw new RangeError("MemoryNodeClient needs at least one node")
    }
  }

  get isClosed(): boolean {
    return this.closed
  }

  async get(key: CacheKey): Promise<CacheResult<T>> {
    this.assertOpen()

    return this.cluster.read(this.nodeFor(key), key)
  }

  async getMany(keys: readonly CacheKey[]): Promise<Map<CacheKey, CacheResult<T>>> {
    this.assertOpen()

    const out = new Map<CacheKey, CacheResult<T>>()

    for (const key of keys) {
      out.set(key, this.cluster.read(this.nodeFor(key), key))
    }

    return out
  }

  async set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<boolean> {
    this.assertOpen()

    return this.cluster.write(this.nodeFor(key), key, value, opts?.ttl)
  }

  async setMany(
    entries: readonly CacheEntry<T>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<CacheKey[]> {
    this.assertOpen()

    const failed: CacheKey[] = []

    for (const [key, value] of entries) {
      if (!this.cluster.write(this.nodeFor(key), key, value, opts?.ttl)) {
        failed.push(key)
      }
    }

    return failed
  }

  async delete(key: CacheKey): Promise<boolean> {
    this.assertOpen()

    return this.cluster.remove(this.nodeFor(key), key)
  }

  async close(): Promise<void> {
    this.closed = true
  }

  nodeFor(key: CacheKey): CacheNode {
    const node = this.nodes[fnv1a(key) % this.nodes.length]
    if (node === undefined) {
      throw new Error("Invariant violation: hash routed outside the node list")
    }

    return node
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error("MemoryNodeClient is closed")
    }
  }
}

export type CreatedClient<T> = Readonly<{
  client: MemoryNodeClient<T>
  nodes: NodeList
  behaviors: ClientBehaviors
}>

/**
 * Builds `MemoryNodeClient`s and remembers each one it built.
 */
export class MemoryNodeClientFactory<T> implements NodeClientFactory<T> {
  readonly created: CreatedClient<T>[] = []

  constructor(private readonly cluster: MemoryCluster<T>) {}

  create(nodes: NodeList, behaviors: ClientBehaviors): MemoryNodeClient<T> {
    const client = new MemoryNodeClient(this.cluster, nodes)
    this.created.push({ client, nodes, behaviors })

    return client
  }

  get last(): CreatedClient<T> | undefined {
    return this.created.at(-1)
  }
}

// 32-bit FNV-1a over UTF-16 code units.
function fnv1a(text: string): number {
  let hash = 0x81_1c_9d_c5

  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i)
    hash = Math.imul(hash, 0x01_00_01_93)
  }

  return hash >>> 0
}
