import type { Logger } from "@discache/logger"
import { createNullLogger } from "@discache/logger"
import { z, type ZodType } from "zod"
import type { MemcachedClientOptions, MemcachedTextClient } from "../../core/memcached-client"
import { createMemcachedClient } from "../../core/memcached-client"
import type { Clock } from "../../core/time/clock"
import { ConfigurationError } from "../../errors/cache-errors"
import type { NodeList } from "../../ports/cluster-node"
import { formatNode } from "../../ports/cluster-node"
import type { ClientBehaviors, NodeClientFactory } from "../../ports/node-client"
import { MemcachedNodeClient } from "./memcached-node-client"

/**
 * Behaviors the `memcached` client takes as constructor options.
 */
export const memcachedBehaviorsSchema = z.strictObject({
  maxKeySize: z.number().int().positive().optional(),
  maxExpiration: z.number().int().positive().optional(),
  maxValue: z.number().int().positive().optional(),
  poolSize: z.number().int().positive().optional(),
  algorithm: z.string().optional(),
  reconnect: z.number().int().nonnegative().optional(),
  timeout: z.number().int().nonnegative().optional(),
  retries: z.number().int().nonnegative().optional(),
  failures: z.number().int().nonnegative().optional(),
  retry: z.number().int().nonnegative().optional(),
  remove: z.boolean().optional(),
  keyCompression: z.boolean().optional(),
  idle: z.number().int().nonnegative().optional(),
  encoding: z.string().optional(),
  debug: z.boolean().optional(),
})

export type MemcachedBehaviors = z.infer<typeof memcachedBehaviorsSchema>

/**
 * @throws {ConfigurationError} when a behavior is unknown or has the wrong type.
 */
export function parseMemcachedBehaviors(behaviors: ClientBehaviors): MemcachedBehaviors {
  const parsed = memcachedBehaviorsSchema.safeParse(behaviors)

  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid client behaviors:\n${z.prettifyError(parsed.error)}`,
      { behaviors: Object.keys(behaviors) },
      parsed.error,
    )
  }

  return parsed.data
}

export type MemcachedNodeClientFactoryOptions<T> = {
  valueSchema: ZodType<T>

  /** @default 500 */
  batchSize?: number
}

export type MemcachedNodeClientFactoryDeps = {
  createClient?: (servers: string[], options: MemcachedClientOptions) => MemcachedTextClient
  clock?: Clock
  logger?: Logger
}

/**
 * Builds one `memcached` client per membership, pointed at every node in the
 * list.
 */
export class MemcachedNodeClientFactory<T> implements NodeClientFactory<T> {
  private readonly createClient: (
    servers: string[],
    options: MemcachedClientOptions,
  ) => MemcachedTextClient
  private readonly logger: Logger

  constructor(
    private readonly opts: MemcachedNodeClientFactoryOptions<T>,
    private readonly deps: MemcachedNodeClientFactoryDeps = {},
  ) {
    this.createClient = deps.createClient ?? createMemcachedClient
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "memcached" })
  }

  create(nodes: NodeList, behaviors: ClientBehaviors): MemcachedNodeClient<T> {
    const servers = nodes.map(formatNode)
    const client = this.createClient(servers, parseMemcachedBehaviors(behaviors))

    this.logger.debug("created memcached client", { nodeCount: servers.length, servers })

    return new MemcachedNodeClient(
      { client, ...(this.deps.clock !== undefined && { clock: this.deps.clock }) },
      { valueSchema: this.opts.valueSchema, batchSize: this.opts.batchSize ?? 500 },
      nodes,
    )
  }
}
