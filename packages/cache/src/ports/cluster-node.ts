/**
 * A `host:port` address of one cache node.
 */
export type CacheNode = Readonly<{
  host: string
  port: number
}>

/**
 * The single stable address a client asks for cluster membership.
 */
export type ConfigurationEndpoint = CacheNode

/**
 * Live cache nodes in the order the configuration endpoint listed them.
 *
 * @remarks
 * Produced only by discovery and frozen; a later discovery replaces it
 * wholesale.
 */
export type NodeList = readonly CacheNode[]

/**
 * Outcome of one discovery.
 */
export type ClusterConfig = Readonly<{
  /**
   * Configuration version reported by the endpoint. `0` when the list was
   * not produced by the endpoint.
   */
  version: number

  nodes: NodeList

  /**
   * `true` when the ignore-cluster-errors policy produced `nodes` instead of
   * a valid endpoint reply.
   */
  degraded: boolean
}>

export function formatNode(node: CacheNode): string {
  return `${node.host}:${node.port}`
}
