import { createConnection, type Socket } from "node:net"
import type { Logger } from "@discache/logger"
import { createNullLogger } from "@discache/logger"
import { DiscoveryConnectivityError, DiscoveryProtocolError } from "../../errors/cache-errors"
import type { ClusterDiscovery, DiscoveryRequest } from "../../ports/cluster-discovery"
import type { ClusterConfig, ConfigurationEndpoint } from "../../ports/cluster-node"
import { formatNode } from "../../ports/cluster-node"
import type { Milliseconds } from "../../ports/time"
import {
  type DiscoveryCommand,
  type DiscoveryReply,
  parseClusterConfig,
  parseVersionReply,
  readDiscoveryReply,
  selectDiscoveryCommand,
  VERSION_COMMAND,
} from "./protocol"

export const DEFAULT_DISCOVERY_TIMEOUT_MS: Milliseconds = 5_000

export type SocketClusterDiscoveryOptions = {
  /**
   * Applied when a request carries no timeout.
   *
   * @default 5_000
   */
  defaultTimeoutMs: Milliseconds
}

export type SocketClusterDiscoveryDeps = {
  logger?: Logger
}

type Exchange = {
  command: DiscoveryCommand
  reply: DiscoveryReply
}

/**
 * Discovers membership by talking to the configuration endpoint over the
 * memcached text protocol: `version` first, then `config get cluster` (or the
 * legacy `get AmazonElastiCache:cluster` on engines before 1.4.14).
 *
 * With `ignoreClusterErrors`:
 * - an `ERROR` reply to the discovery command (the endpoint is a plain
 *   memcached) yields the endpoint itself as the only node;
 * - an unreachable endpoint yields an empty node list.
 *
 * Both results are flagged `degraded`. Malformed replies always fail.
 */
export class SocketClusterDiscovery implements ClusterDiscovery {
  private readonly opts: SocketClusterDiscoveryOptions
  private readonly logger: Logger

  constructor(
    opts: Partial<SocketClusterDiscoveryOptions> = {},
    deps: SocketClusterDiscoveryDeps = {},
  ) {
    this.opts = { defaultTimeoutMs: opts.defaultTimeoutMs ?? DEFAULT_DISCOVERY_TIMEOUT_MS }
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "discovery" })
  }

  async discover(request: DiscoveryRequest): Promise<ClusterConfig> {
    const { endpoint, ignoreClusterErrors } = request
    const timeoutMs = request.timeoutMs ?? this.opts.defaultTimeoutMs

    let exchange: Exchange

    try {
      exchange = await this.converse(endpoint, timeoutMs)
    } catch (err) {
      if (ignoreClusterErrors && err instanceof DiscoveryConnectivityError) {
        this.logger.warn("configuration endpoint unreachable, using an empty node list", {
          endpoint: formatNode(endpoint),
          err,
        })
        return degraded([])
      }

      throw err
    }

    const { command, reply } = exchange

    if (reply.kind === "error") {
      if (ignoreClusterErrors) {
        this.logger.warn("endpoint is not a cluster, using it as the only node", {
          endpoint: formatNode(endpoint),
        })
        return degraded([endpoint])
      }

      throw new DiscoveryProtocolError(command.text, reply.raw, "endpoint returned an error")
    }

    return parseClusterConfig(reply.raw, command)
  }

  private converse(endpoint: ConfigurationEndpoint, timeoutMs: Milliseconds): Promise<Exchange> {
    return new Promise((resolve, reject) => {
      const socket: Socket = createConnection({ host: endpoint.host, port: endpoint.port })

      let settled = false
      let buffer = ""
      let command: DiscoveryCommand | undefined

      const settle = (outcome: () => void) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        socket.destroy()
        outcome()
      }

      const fail = (err: unknown) => settle(() => reject(err))

      const timer = setTimeout(() => {
        fail(new DiscoveryConnectivityError(endpoint, `Discovery timed out after ${timeoutMs}ms`))
      }, timeoutMs)

      socket.on("connect", () => {
        socket.write(`${VERSION_COMMAND}\r\n`)
      })

      socket.setEncoding("utf8")

      socket.on("data", (chunk: string) => {
        buffer += chunk

        if (command === undefined) {
          const eol = buffer.indexOf("\n")
          if (eol === -1) return

          const line = buffer.slice(0, eol)
          buffer = buffer.slice(eol + 1)

          try {
            command = selectDiscoveryCommand(parseVersionReply(line))
          } catch (err) {
            fail(err)
            return
          }

          socket.write(`${command.text}\r\n`)
        }

        const reply = readDiscoveryReply(buffer)
        const current = command

        if (reply !== undefined) {
          settle(() => resolve({ command: current, reply }))
        }
      })

      socket.on("error", (err: NodeJS.ErrnoException) => {
        fail(new DiscoveryConnectivityError(endpoint, describeSocketError(err), err))
      })

      socket.on("close", () => {
        fail(
          new DiscoveryConnectivityError(
            endpoint,
            "Connection closed before discovery completed",
          ),
        )
      })
    })
  }
}

function degraded(nodes: ConfigurationEndpoint[]): ClusterConfig {
  return Object.freeze({ version: 0, nodes: Object.freeze(nodes), degraded: true })
}

function describeSocketError(err: NodeJS.ErrnoException): string {
  switch (err.code) {
    case "ENOTFOUND":
    case "EAI_AGAIN":
      return "Cannot resolve configuration endpoint"
    case "ECONNREFUSED":
      return "Connection refused"
    case "ECONNRESET":
    case "EPIPE":
      return "Connection reset"
    case "ETIMEDOUT":
      return "Connection timed out"
    default:
      return err.message
  }
}
