import type { ZodType } from "zod"
import type { Clock } from "../../core/time/clock"
import { SystemClock } from "../../core/time/clock"
import { toExpirationSeconds } from "../../core/ttl/ttl"
import type { MemcachedCallback, MemcachedTextClient } from "../../core/memcached-client"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { NodeList } from "../../ports/cluster-node"
import type { NodeClient } from "../../ports/node-client"

export type MemcachedNodeClientOptions<T> = {
  /**
   * Maximum number of keys sent in one `getMulti`.
   *
   * Larger `getMany` calls are split into batches of this size.
   */
  batchSize: number

  /**
   * Validates values read back from the cluster. A stored value that does
   * not match reads as a miss.
   */
  valueSchema: ZodType<T>
}

export type MemcachedNodeClientDeps = {
  client: MemcachedTextClient
  clock?: Clock
}

export class MemcachedNodeClient<T> implements NodeClient<T> {
  private readonly client: MemcachedTextClient
  private readonly clock: Clock

  constructor(
    deps: MemcachedNodeClientDeps,
    private readonly opts: MemcachedNodeClientOptions<T>,
    readonly nodes: NodeList,
  ) {
    this.client = deps.client
    this.clock = deps.clock ?? new SystemClock()
  }

  async get(key: CacheKey): Promise<CacheResult<T>> {
    const raw = await call<unknown>((cb) => this.client.get(key, cb))

    return this.createCacheResult(raw)
  }

  async getMany(keys: readonly CacheKey[]): Promise<Map<CacheKey, CacheResult<T>>> {
    if (keys.length === 0) return new Map()

    const out = new Map<CacheKey, CacheResult<T>>()

    for (const batch of chunks(keys, this.opts.batchSize)) {
      const found = await call<Record<string, unknown> | undefined>((cb) =>
        this.client.getMulti(batch, cb),
      )

      for (const key of batch) {
        out.set(key, this.createCacheResult(found?.[key]))
      }
    }

    return out
  }

  async set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<boolean> {
    const lifetime = toExpirationSeconds(opts?.ttl, this.clock.nowMs())

    return call<boolean>((cb) => this.client.set(key, value, lifetime, cb))
  }

  async setMany(
    entries: readonly CacheEntry<T>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<CacheKey[]> {
    if (entries.length === 0) return []

    const stored = await Promise.all(entries.map(([key, value]) => this.set(key, value, opts)))

    return entries.filter((_, i) => stored[i] !== true).map(([key]) => key)
  }

  async delete(key: CacheKey): Promise<boolean> {
    return call<boolean>((cb) => this.client.del(key, cb))
  }

  async close(): Promise<void> {
    this.client.end()
  }

  private createCacheResult(raw: unknown): CacheResult<T> {
    if (raw === undefined || raw === null) return { kind: "miss" }

    const parsed = this.opts.valueSchema.safeParse(raw)

    return parsed.success ? { kind: "hit", value: parsed.data } : { kind: "miss" }
  }
}

function call<R>(start: (cb: MemcachedCallback<R>) => void): Promise<R> {
  return new Promise((resolve, reject) => {
    start((err, result) => {
      if (err) {
        reject(err)
        return
      }

      resolve(result)
    })
  })
}

function* chunks<A>(items: readonly A[], size: number): Generator<A[]> {
  for (let i = 0; i < items.length; i += size) {
    yield items.slice(i, i + size)
  }
}
