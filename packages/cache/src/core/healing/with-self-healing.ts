import type { Logger } from "@discache/logger"
import type { NodeClient } from "../../ports/node-client"
import type { NodeClientCache } from "../client/node-client-cache"
import type { MembershipCache } from "../membership/membership-cache"

export type HealingTargets<T> = Readonly<{
  membership: MembershipCache
  clients: NodeClientCache<T>
  logger: Logger
}>

/**
 * Run `run` against the current node client. If anything fails, obtaining
 * the client included, forget both the membership and the client so the
 * next call discovers again, then rethrow the same error.
 */
export async function withSelfHealing<T, R>(
  targets: HealingTargets<T>,
  operation: string,
  run: (client: NodeClient<T>) => Promise<R>,
): Promise<R> {
  try {
    const client = await targets.clients.getClient()

    return await run(client)
  } catch (err) {
    const generation = targets.membership.generation

    targets.membership.invalidate()
    targets.clients.invalidate()

    targets.logger.warn("cache operation failed, cluster nodes will be rediscovered", {
      operation,
      generation,
      err,
    })

    throw err
  }
}
