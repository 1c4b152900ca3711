import type { Logger } from "@discache/logger"
import { createNullLogger } from "@discache/logger"
import type { CacheBackend } from "../../ports/cache-backend"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { NodeClientCache } from "../client/node-client-cache"
import type { MembershipCache } from "../membership/membership-cache"
import { type HealingTargets, withSelfHealing } from "./with-self-healing"

export type SelfHealingCacheDeps<T> = {
  membership: MembershipCache
  clients: NodeClientCache<T>
  logger?: Logger
}

/**
 * "cold": no membership and no client are held. The next operation
 * discovers. "warm": both are held.
 */
export type CacheState = "cold" | "warm"

/**
 * The five cache operations over the current node client. A failed
 * operation leaves the cache cold and rejects with the error the node
 * client raised; nothing is retried.
 */
export class SelfHealingCache<T> implements CacheBackend<T> {
  private readonly targets: HealingTargets<T>

  constructor(deps: SelfHealingCacheDeps<T>) {
    this.targets = {
      membership: deps.membership,
      clients: deps.clients,
      logger: (deps.logger ?? createNullLogger()).child({ module: "healing" }),
    }
  }

  get(key: CacheKey): Promise<CacheResult<T>> {
    return withSelfHealing(this.targets, "get", (client) => client.get(key))
  }

  getMany(keys: readonly CacheKey[]): Promise<Map<CacheKey, CacheResult<T>>> {
    return withSelfHealing(this.targets, "getMany", (client) => client.getMany(keys))
  }

  set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<boolean> {
    return withSelfHealing(this.targets, "set", (client) => client.set(key, value, opts))
  }

  setMany(
    entries: readonly CacheEntry<T>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<CacheKey[]> {
    return withSelfHealing(this.targets, "setMany", (client) => client.setMany(entries, opts))
  }

  delete(key: CacheKey): Promise<boolean> {
    return withSelfHealing(this.targets, "delete", (client) => client.delete(key))
  }

  state(): CacheState {
    const { membership, clients } = this.targets

    return membership.snapshot() !== undefined && clients.peek() !== undefined ? "warm" : "cold"
  }

  /**
   * Forget membership and the client without an operation failing.
   */
  invalidate(): void {
    this.targets.membership.invalidate()
    this.targets.clients.invalidate()
  }
}
