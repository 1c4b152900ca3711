import type { ClusterConfig, ConfigurationEndpoint } from "./cluster-node"
import type { Milliseconds } from "./time"

export type DiscoveryRequest = Readonly<{
  endpoint: ConfigurationEndpoint

  /**
   * Bound on the whole exchange with the endpoint. The transport's default
   * applies when omitted.
   */
  timeoutMs?: Milliseconds

  /**
   * Degrade instead of failing when the endpoint is unreachable or is not a
   * cluster configuration endpoint. See `SocketClusterDiscovery` for the
   * exact policy.
   */
  ignoreClusterErrors: boolean
}>

/**
 * Asks a configuration endpoint for the current cluster membership.
 *
 * @remarks
 * One call is one short-lived exchange. Implementations never retry; the
 * caller decides when to ask again.
 */
export interface ClusterDiscovery {
  discover(request: DiscoveryRequest): Promise<ClusterConfig>
}
