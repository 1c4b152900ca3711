import { DiscoveryProtocolError } from "../../errors/cache-errors"
import type { CacheNode, ClusterConfig } from "../../ports/cluster-node"

export const VERSION_COMMAND = "version"

export type DiscoveryCommand = Readonly<{
  text: string

  /** Reply header keyword: `CONFIG` or `VALUE`. */
  header: string
}>

export const CONFIG_GET_CLUSTER: DiscoveryCommand = {
  text: "config get cluster",
  header: "CONFIG",
}

/** Engines before 1.4.14 publish membership under a reserved key instead. */
export const LEGACY_GET_CLUSTER: DiscoveryCommand = {
  text: "get AmazonElastiCache:cluster",
  header: "VALUE",
}

const CONFIG_COMMAND_SINCE = [1, 4, 14] as const

export type EngineVersion = readonly number[]

/**
 * Parse the reply to `version`, e.g. `VERSION 1.6.12`.
 */
export function parseVersionReply(line: string): EngineVersion {
  const tokens = line.trim().split(/\s+/)

  if (tokens.length < 2 || tokens.length > 3 || tokens[0] !== "VERSION") {
    throw new DiscoveryProtocolError(VERSION_COMMAND, line, "expected VERSION <x.y.z>")
  }

  const parts = (tokens[1] ?? "").split(".").map((p) => Number.parseInt(p, 10))

  if (parts.some((p) => Number.isNaN(p))) {
    throw new DiscoveryProtocolError(VERSION_COMMAND, line, "engine version is not numeric")
  }

  return parts
}

export function selectDiscoveryCommand(engine: EngineVersion): DiscoveryCommand {
  return compareVersions(engine, CONFIG_COMMAND_SINCE) >= 0
    ? CONFIG_GET_CLUSTER
    : LEGACY_GET_CLUSTER
}

export function compareVersions(a: EngineVersion, b: EngineVersion): number {
  const length = Math.max(a.length, b.length)

  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0)
    if (diff !== 0) return Math.sign(diff)
  }

  return 0
}

export type DiscoveryReply = { kind: "config"; raw: string } | { kind: "error"; raw: string }

function replyLines(raw: string): string[] {
  return raw
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0)
}

/**
 * Classify the bytes received so far, or return undefined while the reply
 * is incomplete. A reply is complete once its last line is `END` or an error
 * line and it ends with a newline.
 */
export function readDiscoveryReply(buffer: string): DiscoveryReply | undefined {
  if (!buffer.endsWith("\n")) return undefined

  const last = replyLines(buffer).at(-1)

  if (last === undefined) return undefined
  if (last === "END") return { kind: "config", raw: buffer }
  if (isErrorLine(last)) return { kind: "error", raw: buffer }

  return undefined
}

function isErrorLine(line: string): boolean {
  return line === "ERROR" || line.startsWith("CLIENT_ERROR") || line.startsWith("SERVER_ERROR")
}

/**
 * Parse a complete discovery reply:
 *
 * ```
 * CONFIG cluster 0 <length>
 * <config version>
 * <hostname>|<ip>|<port> <hostname>|<ip>|<port> ...
 *
 * END
 * ```
 *
 * Blank lines and surrounding whitespace are tolerated; anything else out of
 * place is a protocol error.
 */
export function parseClusterConfig(raw: string, command: DiscoveryCommand): ClusterConfig {
  const fail = (detail: string) => new DiscoveryProtocolError(command.text, raw, detail)
  const lines = replyLines(raw)

  if (lines.length !== 4) {
    throw fail(`expected 4 lines, got ${lines.length}`)
  }

  const [header = "", versionLine = "", nodeLine = "", end = ""] = lines

  if (header.split(/\s+/)[0] !== command.header) {
    throw fail(`expected a ${command.header} header`)
  }
  if (end !== "END") {
    throw fail("missing END")
  }
  if (!/^\d+$/.test(versionLine)) {
    throw fail(`invalid config version "${versionLine}"`)
  }

  const nodes = nodeLine.split(/\s+/).map((entry) => parseNodeEntry(entry, fail))

  return Object.freeze({
    version: Number(versionLine),
    nodes: Object.freeze(nodes),
    degraded: false,
  })
}

/**
 * `hostname|ip|port`; the ip is preferred and may be empty.
 */
export function parseNodeEntry(
  entry: string,
  fail: (detail: string) => Error,
): CacheNode {
  const fields = entry.split("|")

  if (fields.length !== 3) {
    throw fail(`invalid node entry "${entry}"`)
  }

  const [hostname = "", ip = "", portText = ""] = fields
  const host = ip || hostname
  const port = Number(portText)

  if (host.length === 0) {
    throw fail(`node entry "${entry}" has no address`)
  }
  if (!/^\d+$/.test(portText) || port < 1 || port > 65_535) {
    throw fail(`node entry "${entry}" has an invalid port`)
  }

  return Object.freeze({ host, port })
}
