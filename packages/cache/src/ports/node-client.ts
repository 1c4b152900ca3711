import type { CacheBackend } from "./cache-backend"
import type { NodeList } from "./cluster-node"

/**
 * Tuning options handed to the key-value client when it is built (timeouts,
 * pool size, hashing algorithm and so on).
 *
 * @remarks
 * Always a flat map. Host adapters that accept nested shapes flatten them
 * before they reach the core.
 */
export type ClientBehaviors = Readonly<Record<string, unknown>>

/**
 * A key-value client bound to one node list for its whole life.
 */
export interface NodeClient<T> extends CacheBackend<T> {
  /**
   * Release the client's connections.
   */
  close(): Promise<void>
}

export interface NodeClientFactory<T> {
  /**
   * Build a client for `nodes`. Called once per membership, with the
   * behaviors the cache was configured with.
   */
  create(nodes: NodeList, behaviors: ClientBehaviors): NodeClient<T>
}
