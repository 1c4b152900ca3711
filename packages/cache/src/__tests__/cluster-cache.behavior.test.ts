import { z } from "zod"
import { MemoryCluster } from "../adapters/memory/memory-cluster"
import { MemoryNodeClientFactory } from "../adapters/memory/memory-node-client"
import { createClusterCache } from "../cluster-cache"
import { SocketClusterDiscovery } from "../core/discovery/socket-discovery"
import {
  ConfigurationError,
  DiscoveryConnectivityError,
  NodeUnavailableError,
  NoNodesError,
} from "../errors/cache-errors"
import type { ClusterDiscovery } from "../ports/cluster-discovery"
import { entry, keys, nodes, values } from "../tests/utils/cache-test-helpers"
import { closedEndpoint, FakeConfigEndpoint } from "../tests/utils/fake-config-endpoint"
import { clusterConfig, RecordingDiscovery } from "../tests/utils/recording-discovery"

const ENDPOINT = "cfg.example.com:11211"

describe("createClusterCache", () => {
  let cluster: MemoryCluster<string>
  let factory: MemoryNodeClientFactory<string>
  let discovery: RecordingDiscovery

  beforeEach(() => {
    cluster = new MemoryCluster<string>()
    cluster.addNode(nodes.first())
    cluster.addNode(nodes.second())
    factory = new MemoryNodeClientFactory(cluster)
    discovery = new RecordingDiscovery(clusterConfig([nodes.first(), nodes.second()]))
  })

  describe("construction", () => {
    it.each([
      ["two endpoints in a string", "cfg-a.example.com:11211;cfg-b.example.com:11211"],
      ["two endpoints in a list", ["cfg-a.example.com:11211", "cfg-b.example.com:11211"]],
      ["an endpoint without a port", "cfg.example.com"],
      ["no endpoint", ""],
    ])("rejects %s before any network call", (_name, location) => {
      expect(() => createClusterCache(location, {}, { factory, discovery })).toThrow(
        ConfigurationError,
      )
      expect(discovery.calls).toBe(0)
    })

    it("rejects invalid params", () => {
      expect(() =>
        createClusterCache(ENDPOINT, { DISCOVERY_TIMEOUT: -1 }, { factory, discovery }),
      ).toThrow(ConfigurationError)
    })

    it("rejects unknown memcached behaviors up front", () => {
      expect(() =>
        createClusterCache(
          ENDPOINT,
          { OPTIONS: { behaviors: { tcpNoDelay: true } } },
          { valueSchema: z.string(), discovery },
        ),
      ).toThrow(/Invalid client behaviors/)
    })

    it("does not discover until the first operation", () => {
      const cache = createClusterCache(ENDPOINT, {}, { factory, discovery })

      expect(cache.state()).toBe("cold")
      expect(cache.nodes()).toBeUndefined()
      expect(discovery.calls).toBe(0)
    })

    it("passes the parsed endpoint and discovery timeout to discovery", async () => {
      const cache = createClusterCache(
        ENDPOINT,
        { DISCOVERY_TIMEOUT: 2, OPTIONS: { IGNORE_CLUSTER_ERRORS: true } },
        { factory, discovery },
      )

      await cache.get(keys.one())

      expect(discovery.requests).toStrictEqual([
        { endpoint: nodes.endpoint(), timeoutMs: 2000, ignoreClusterErrors: true },
      ])
    })

    it("hands the normalized behaviors to the client factory", async () => {
      const cache = createClusterCache(
        ENDPOINT,
        { OPTIONS: { IGNORE_CLUSTER_ERRORS: false, timeout: 500 } },
        { factory, discovery },
      )

      await cache.get(keys.one())

      expect(factory.last?.behaviors).toStrictEqual({ timeout: 500 })
    })
  })

  describe("happy path", () => {
    it("discovers and builds a client once across operations", async () => {
      const cache = createClusterCache(ENDPOINT, {}, { factory, discovery })

      expect(await cache.set("k", "v")).toBe(true)
      expect(await cache.get("k")).toStrictEqual({ kind: "hit", value: "v" })

      expect(discovery.calls).toBe(1)
      expect(factory.created).toHaveLength(1)
      expect(cache.nodes()).toStrictEqual([nodes.first(), nodes.second()])
      expect(cache.state()).toBe("warm")
    })

    it("shares one discovery between concurrent first operations", async () => {
      const cache = createClusterCache(ENDPOINT, {}, { factory, discovery })

      await Promise.all([
        cache.get(keys.one()),
        cache.get(keys.two()),
        cache.set(keys.three(), values.c()),
      ])

      expect(discovery.calls).toBe(1)
      expect(factory.created).toHaveLength(1)
    })

    it("covers every operation", async () => {
      const cache = createClusterCache(ENDPOINT, {}, { factory, discovery })

      const failed = await cache.setMany([
        entry(keys.one(), values.a()),
        entry(keys.two(), values.b()),
      ])

      expect(failed).toStrictEqual([])
      expect(await cache.getMany([keys.one(), keys.two(), keys.three()])).toStrictEqual(
        new Map([
          [keys.one(), { kind: "hit", value: values.a() }],
          [keys.two(), { kind: "hit", value: values.b() }],
          [keys.three(), { kind: "miss" }],
        ]),
      )
      expect(await cache.delete(keys.one())).toBe(true)
      expect(await cache.get(keys.one())).toStrictEqual({ kind: "miss" })
    })

    it("reports the keys setMany could not store", async () => {
      cluster.refuse(keys.two())
      const cache = createClusterCache(ENDPOINT, {}, { factory, discovery })

      expect(
        await cache.setMany([entry(keys.one(), values.a()), entry(keys.two(), values.b())]),
      ).toStrictEqual([keys.two()])
    })
  })

  describe("default ttl", () => {
    it("applies TIMEOUT when a write has no ttl", async () => {
      const cache = createClusterCache(ENDPOINT, { TIMEOUT: 0 }, { factory, discovery })

      await cache.set(keys.one(), values.a())

      expect(await cache.get(keys.one())).toStrictEqual({ kind: "miss" })
    })

    it("lets an explicit ttl win", async () => {
      const cache = createClusterCache(ENDPOINT, { TIMEOUT: 0 }, { factory, discovery })

      await cache.setMany([entry(keys.one(), values.a())], {
        ttl: { kind: "seconds", seconds: 60 },
      })

      expect(await cache.get(keys.one())).toStrictEqual({ kind: "hit", value: values.a() })
    })
  })

  describe("self-healing", () => {
    it("rethrows, then rediscovers and uses the new membership", async () => {
      const cache = createClusterCache(ENDPOINT, {}, { factory, discovery })
      await cache.set("k", "v")

      cluster.removeNode(nodes.first())
      cluster.removeNode(nodes.second())
      cluster.addNode(nodes.third())
      discovery.config = clusterConfig([nodes.third()], 2)

      await expect(cache.get("k")).rejects.toBeInstanceOf(NodeUnavailableError)
      expect(cache.state()).toBe("cold")

      expect(await cache.set("k", "v2")).toBe(true)
      expect(await cache.get("k")).toStrictEqual({ kind: "hit", value: "v2" })

      expect(discovery.calls).toBe(2)
      expect(factory.created).toHaveLength(2)
      expect(factory.last?.nodes).toStrictEqual([nodes.third()])
    })

    it("fails a call once without retrying it", async () => {
      const cache = createClusterCache(ENDPOINT, {}, { factory, discovery })
      await cache.get(keys.one())
      cluster.fail(nodes.first())
      cluster.fail(nodes.second())

      await expect(cache.get(keys.one())).rejects.toBeInstanceOf(NodeUnavailableError)

      expect(discovery.calls).toBe(1)
      expect(factory.created).toHaveLength(1)
    })

    it("invalidate() forces a fresh discovery", async () => {
      const cache = createClusterCache(ENDPOINT, {}, { factory, discovery })
      await cache.get(keys.one())

      cache.invalidate()
      await cache.get(keys.one())

      expect(discovery.calls).toBe(2)
    })

    it("close() closes the current client and goes cold", async () => {
      const cache = createClusterCache(ENDPOINT, {}, { factory, discovery })
      await cache.get(keys.one())

      await cache.close()

      expect(factory.last?.client.isClosed).toBe(true)
      expect(cache.state()).toBe("cold")
    })
  })

  describe("client scope", () => {
    it("builds a client per scope with CLIENT_SCOPE context", async () => {
      const cache = createClusterCache(
        ENDPOINT,
        { CLIENT_SCOPE: "context" },
        { factory, discovery },
      )

      await cache.runInScope(() => cache.get(keys.one()))
      await cache.runInScope(() => cache.get(keys.one()))

      expect(factory.created).toHaveLength(2)
      expect(discovery.calls).toBe(1)
    })

    it("shares one client across scopes by default", async () => {
      const cache = createClusterCache(ENDPOINT, {}, { factory, discovery })

      await cache.runInScope(() => cache.get(keys.one()))
      await cache.runInScope(() => cache.get(keys.one()))

      expect(factory.created).toHaveLength(1)
    })
  })

  describe("ignore cluster errors", () => {
    let server: FakeConfigEndpoint

    beforeEach(async () => {
      server = new FakeConfigEndpoint({ mode: "error" })
      await server.start()
    })

    afterEach(async () => {
      await server.stop()
    })

    function location(endpoint: { host: string; port: number }): string {
      return `${endpoint.host}:${endpoint.port}`
    }

    it("uses a plain memcached endpoint as the only node", async () => {
      cluster.addNode(server.endpoint)
      const cache = createClusterCache(
        location(server.endpoint),
        { OPTIONS: { IGNORE_CLUSTER_ERRORS: true } },
        { factory, discovery: new SocketClusterDiscovery() },
      )

      expect(await cache.set(keys.one(), values.a())).toBe(true)
      expect(cache.nodes()).toStrictEqual([server.endpoint])
    })

    it("caches an empty node list for an unreachable endpoint, then rediscovers", async () => {
      const endpoint = await closedEndpoint()
      const socketDiscovery = new SocketClusterDiscovery()
      const discover = vi.spyOn(socketDiscovery, "discover")
      const cache = createClusterCache(
        location(endpoint),
        { OPTIONS: { IGNORE_CLUSTER_ERRORS: true } },
        { factory, discovery: socketDiscovery },
      )

      await expect(cache.get(keys.one())).rejects.toBeInstanceOf(NoNodesError)
      await expect(cache.get(keys.one())).rejects.toBeInstanceOf(NoNodesError)

      expect(discover).toHaveBeenCalledTimes(2)
      expect(factory.created).toHaveLength(0)
    })

    it("names the operation in the no-nodes error", async () => {
      const endpoint = await closedEndpoint()
      const cache = createClusterCache(
        location(endpoint),
        { OPTIONS: { IGNORE_CLUSTER_ERRORS: true } },
        { factory, discovery: new SocketClusterDiscovery() },
      )

      const failure = await cache.get(keys.one()).catch((e: unknown) => e)

      expect(failure).toMatchObject({ code: "no_nodes", context: { operation: "get" } })
      expect(cache.state()).toBe("cold")
    })

    it("surfaces an unreachable endpoint when the flag is off", async () => {
      const failing: ClusterDiscovery = {
        discover: () =>
          Promise.reject(new DiscoveryConnectivityError(nodes.endpoint(), "Connection refused")),
      }
      const cache = createClusterCache(ENDPOINT, {}, { factory, discovery: failing })

      await expect(cache.get(keys.one())).rejects.toMatchObject({
        code: "cluster_connection",
        message: "Cannot connect to cluster cfg.example.com:11211 (Connection refused (cfg.example.com:11211))",
      })
    })
  })
})
