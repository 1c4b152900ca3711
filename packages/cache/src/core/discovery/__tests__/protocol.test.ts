import { DiscoveryProtocolError } from "../../../errors/cache-errors"
import {
  CONFIG_GET_CLUSTER,
  compareVersions,
  LEGACY_GET_CLUSTER,
  parseClusterConfig,
  parseVersionReply,
  readDiscoveryReply,
  selectDiscoveryCommand,
} from "../protocol"

const CONFIG_REPLY =
  "CONFIG cluster 0 83\r\n" +
  "12\n" +
  "node-1.cfg.example.com|10.0.0.1|11211 node-2.cfg.example.com|10.0.0.2|11211\n" +
  "\r\n" +
  "END\r\n"

describe("parseVersionReply", () => {
  it("parses a plain version", () => {
    expect(parseVersionReply("VERSION 1.6.12")).toEqual([1, 6, 12])
  })

  it("tolerates a trailing token and whitespace", () => {
    expect(parseVersionReply("  VERSION 1.4.14 extra\r\n")).toEqual([1, 4, 14])
  })

  it("reads the numeric prefix of each part", () => {
    expect(parseVersionReply("VERSION 1.5.0-rc1")).toEqual([1, 5, 0])
  })

  it.each(["ERROR", "VERSION", "VERSIONS 1.4.14", "VERSION a.b.c", "VERSION 1 2 3"])(
    "rejects %j",
    (line) => {
      expect(() => parseVersionReply(line)).toThrow(DiscoveryProtocolError)
    },
  )
})

describe("selectDiscoveryCommand", () => {
  it.each([
    [[1, 4, 14], CONFIG_GET_CLUSTER],
    [[1, 6, 0], CONFIG_GET_CLUSTER],
    [[2], CONFIG_GET_CLUSTER],
    [[1, 4, 13], LEGACY_GET_CLUSTER],
    [[1, 4], LEGACY_GET_CLUSTER],
  ])("engine %j uses %o", (engine, command) => {
    expect(selectDiscoveryCommand(engine)).toBe(command)
  })
})

describe("compareVersions", () => {
  it("treats missing parts as zero", () => {
    expect(compareVersions([1, 4], [1, 4, 0])).toBe(0)
    expect(compareVersions([1, 4], [1, 4, 1])).toBe(-1)
    expect(compareVersions([1, 10], [1, 9, 99])).toBe(1)
  })
})

describe("readDiscoveryReply", () => {
  it("waits for the END line", () => {
    expect(readDiscoveryReply("CONFIG cluster 0 83\r\n12\n")).toBeUndefined()
    expect(readDiscoveryReply("CONFIG cluster 0 83\r\n12\nEN")).toBeUndefined()
  })

  it("recognizes a complete config reply", () => {
    expect(readDiscoveryReply(CONFIG_REPLY)).toEqual({ kind: "config", raw: CONFIG_REPLY })
  })

  it.each(["ERROR\r\n", "CLIENT_ERROR bad command line format\r\n", "SERVER_ERROR busy\r\n"])(
    "recognizes the error reply %j",
    (raw) => {
      expect(readDiscoveryReply(raw)).toEqual({ kind: "error", raw })
    },
  )

  it("returns undefined for an empty buffer", () => {
    expect(readDiscoveryReply("")).toBeUndefined()
    expect(readDiscoveryReply("\r\n")).toBeUndefined()
  })
})

describe("parseClusterConfig", () => {
  it("parses version and nodes in order, preferring the ip", () => {
    const config = parseClusterConfig(CONFIG_REPLY, CONFIG_GET_CLUSTER)

    expect(config).toEqual({
      version: 12,
      nodes: [
        { host: "10.0.0.1", port: 11211 },
        { host: "10.0.0.2", port: 11211 },
      ],
      degraded: false,
    })
  })

  it("falls back to the hostname when the ip is empty", () => {
    const raw = "CONFIG cluster 0 30\r\n3\nnode-1.cfg.example.com||11211\n\r\nEND\r\n"

    expect(parseClusterConfig(raw, CONFIG_GET_CLUSTER).nodes).toEqual([
      { host: "node-1.cfg.example.com", port: 11211 },
    ])
  })

  it("accepts the legacy VALUE header", () => {
    const raw = "VALUE AmazonElastiCache:cluster 0 21\r\n1\nnode-1||11211\n\r\nEND\r\n"

    expect(parseClusterConfig(raw, LEGACY_GET_CLUSTER)).toEqual({
      version: 1,
      nodes: [{ host: "node-1", port: 11211 }],
      degraded: false,
    })
  })

  it("tolerates bare newlines and extra spaces between nodes", () => {
    const raw = "CONFIG cluster 0 40\n7\n  a|10.0.0.1|11211   b|10.0.0.2|11212 \n\nEND\n"

    expect(parseClusterConfig(raw, CONFIG_GET_CLUSTER).nodes).toEqual([
      { host: "10.0.0.1", port: 11211 },
      { host: "10.0.0.2", port: 11212 },
    ])
  })

  it("freezes the node list", () => {
    const config = parseClusterConfig(CONFIG_REPLY, CONFIG_GET_CLUSTER)

    expect(Object.isFrozen(config.nodes)).toBe(true)
    expect(Object.isFrozen(config.nodes[0])).toBe(true)
  })

  it.each([
    ["a missing node line", "CONFIG cluster 0 3\r\n12\n\r\nEND\r\n", "expected 4 lines, got 3"],
    [
      "a non-numeric version",
      "CONFIG cluster 0 3\r\nabc\na|10.0.0.1|11211\n\r\nEND\r\n",
      'invalid config version "abc"',
    ],
    [
      "the wrong header",
      "VALUE cluster 0 3\r\n1\na|10.0.0.1|11211\n\r\nEND\r\n",
      "expected a CONFIG header",
    ],
    [
      "a short node entry",
      "CONFIG cluster 0 3\r\n1\na|10.0.0.1\n\r\nEND\r\n",
      'invalid node entry "a|10.0.0.1"',
    ],
    [
      "an empty address",
      "CONFIG cluster 0 3\r\n1\n||11211\n\r\nEND\r\n",
      'node entry "||11211" has no address',
    ],
    [
      "a bad port",
      "CONFIG cluster 0 3\r\n1\na|10.0.0.1|port\n\r\nEND\r\n",
      'node entry "a|10.0.0.1|port" has an invalid port',
    ],
  ])("rejects %s", (_, raw, detail) => {
    expect(() => parseClusterConfig(raw, CONFIG_GET_CLUSTER)).toThrow(
      `Unexpected reply to "config get cluster": ${detail}`,
    )
  })
})
