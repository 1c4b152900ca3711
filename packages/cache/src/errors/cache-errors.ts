import type { CacheNode, ConfigurationEndpoint } from "../ports/cluster-node"
import { formatNode } from "../ports/cluster-node"
import { BaseError, type ErrorContext } from "./base-error"

/**
 * The cache was constructed with an unusable location or parameters.
 * Raised before any network call.
 */
export class ConfigurationError extends BaseError<"configuration_error"> {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, {
      code: "configuration_error",
      ...(context !== undefined && { context }),
      ...(cause !== undefined && { cause }),
    })
  }
}

/**
 * The configuration endpoint could not be resolved, refused or dropped the
 * connection, or did not answer within the discovery timeout.
 */
export class DiscoveryConnectivityError extends BaseError<"discovery_connectivity"> {
  constructor(
    readonly endpoint: ConfigurationEndpoint,
    reason: string,
    cause?: unknown,
  ) {
    super(`${reason} (${formatNode(endpoint)})`, {
      code: "discovery_connectivity",
      context: { endpoint: formatNode(endpoint) },
      isRetryable: true,
      ...(cause !== undefined && { cause }),
    })
  }
}

/**
 * The configuration endpoint answered with something that is not a
 * discovery reply.
 */
export class DiscoveryProtocolError extends BaseError<"discovery_protocol"> {
  constructor(
    readonly command: string,
    readonly reply: string,
    detail: string,
  ) {
    super(`Unexpected reply to "${command}": ${detail}`, {
      code: "discovery_protocol",
      context: { command, reply },
    })
  }
}

/**
 * Membership could not be discovered because the endpoint was unreachable.
 * Wraps the connectivity error as `cause`.
 */
export class ClusterConnectionError extends BaseError<"cluster_connection"> {
  constructor(
    readonly endpoint: ConfigurationEndpoint,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)

    super(`Cannot connect to cluster ${formatNode(endpoint)} (${reason})`, {
      code: "cluster_connection",
      context: { endpoint: formatNode(endpoint) },
      cause,
      isRetryable: true,
    })
  }
}

/**
 * The current membership lists no nodes, so there is nowhere to send the
 * operation.
 */
export class NoNodesError extends BaseError<"no_nodes"> {
  constructor(endpoint: ConfigurationEndpoint, operation: string) {
    super(`No cache nodes known for cluster ${formatNode(endpoint)}`, {
      code: "no_nodes",
      context: { endpoint: formatNode(endpoint), operation },
      isRetryable: true,
    })
  }
}

/**
 * A node from the current membership could not serve the request.
 */
export class NodeUnavailableError extends BaseError<"node_unavailable"> {
  constructor(
    readonly node: CacheNode,
    operation: string,
  ) {
    super(`Cache node ${formatNode(node)} is unavailable`, {
      code: "node_unavailable",
      context: { node: formatNode(node), operation },
      isRetryable: true,
    })
  }
}

export function isRetryableError(err: unknown): boolean {
  return err instanceof BaseError && err.isRetryable
}
