import { NoNodesError } from "../../errors/cache-errors"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { ConfigurationEndpoint } from "../../ports/cluster-node"
import type { NodeClient } from "../../ports/node-client"

/**
 * Stands in for a node client while membership lists no nodes. Every
 * operation rejects with `NoNodesError`.
 */
export class NoNodesClient<T> implements NodeClient<T> {
  constructor(private readonly endpoint: ConfigurationEndpoint) {}

  get(_key: CacheKey): Promise<CacheResult<T>> {
    return this.reject("get")
  }

  getMany(_keys: readonly CacheKey[]): Promise<Map<CacheKey, CacheResult<T>>> {
    return this.reject("getMany")
  }

  set(_key: CacheKey, _value: T): Promise<boolean> {
    return this.reject("set")
  }

  setMany(_entries: readonly CacheEntry<T>[]): Promise<CacheKey[]> {
    return this.reject("setMany")
  }

  delete(_key: CacheKey): Promise<boolean> {
    return this.reject("delete")
  }

  async close(): Promise<void> {}

  private reject(operation: string): Promise<never> {
    return Promise.reject(new NoNodesError(this.endpoint, operation))
  }
}
