import { ConfigurationError } from "../../errors/cache-errors"
import type { ConfigurationEndpoint } from "../../ports/cluster-node"

const SERVER_SEPARATORS = /[;,]/

/**
 * Resolve the configured cache location to the single configuration
 * endpoint.
 *
 * A string may list several servers separated by `;` or `,`, which host
 * frameworks accept for static clusters. Here that is an error: membership
 * comes from the endpoint, so exactly one `host:port` is allowed.
 */
export function parseLocation(location: string | readonly string[]): ConfigurationEndpoint {
  const raw = typeof location === "string" ? location.split(SERVER_SEPARATORS) : location
  const servers = raw.map((s) => s.trim()).filter((s) => s.length > 0)

  if (servers.length !== 1) {
    throw new ConfigurationError(
      "Cluster cache must be configured with exactly one server (the configuration endpoint)",
      { servers },
    )
  }

  const [server] = servers

  return parseEndpoint(server ?? "")
}

export function parseEndpoint(server: string): ConfigurationEndpoint {
  const parts = server.split(":")

  if (parts.length !== 2) {
    throw new ConfigurationError("Server configuration should be in format host:port", {
      server,
    })
  }

  const [host = "", portText = ""] = parts

  if (host.length === 0) {
    throw new ConfigurationError("Server configuration is missing a host", { server })
  }

  const port = Number(portText)

  if (!/^\d+$/.test(portText) || port < 1 || port > 65_535) {
    throw new ConfigurationError("Server port must be an integer between 1 and 65535", {
      server,
    })
  }

  return Object.freeze({ host, port })
}
