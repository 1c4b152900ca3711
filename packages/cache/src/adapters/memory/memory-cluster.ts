import type { Clock } from "../../core/time/clock"
import { SystemClock } from "../../core/time/clock"
import { expiresAtMs } from "../../core/ttl/ttl"
import { NodeUnavailableError } from "../../errors/cache-errors"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { CacheNode } from "../../ports/cluster-node"
import { formatNode } from "../../ports/cluster-node"
import type { Milliseconds } from "../../ports/time"

export type MemoryClusterOptions = {
  /**
   * Entries each node keeps. The oldest write is evicted first.
   *
   * @default 10_000
   */
  maxEntriesPerNode: number
}

export type MemoryClusterDeps = {
  clock?: Clock
}

type MemoryEntry<T> = {
  value: T
  expiresAtMs?: Milliseconds
}

type MemoryNode<T> = {
  up: boolean
  entries: Map<CacheKey, MemoryEntry<T>>
}

/**
 * An in-process stand-in for a memcached cluster: a set of nodes, each with
 * its own key space, that can be added, removed, failed and recovered.
 *
 * Requests to a node that is not part of the cluster or is down reject with
 * `NodeUnavailableError`.
 */
export class MemoryCluster<T = unknown> {
  private readonly clock: Clock
  private readonly opts: MemoryClusterOptions
  private readonly members = new Map<string, MemoryNode<T>>()
  private readonly refused = new Set<CacheKey>()

  constructor(opts: Partial<MemoryClusterOptions> = {}, deps: MemoryClusterDeps = {}) {
    this.opts = { maxEntriesPerNode: opts.maxEntriesPerNode ?? 10_000 }
    this.clock = deps.clock ?? new SystemClock()
  }

  addNode(node: CacheNode): void {
    const id = formatNode(node)
    if (!this.members.has(id)) {
      this.members.set(id, { up: true, entries: new Map() })
    }
  }

  removeNode(node: CacheNode): void {
    this.members.delete(formatNode(node))
  }

  /** Make `node` reject every request until `recover()`. */
  fail(node: CacheNode): void {
    const member = this.members.get(formatNode(node))
    if (member) member.up = false
  }

  recover(node: CacheNode): void {
    const member = this.members.get(formatNode(node))
    if (member) member.up = true
  }

  /** Make writes of `key` report that they were not stored. */
  refuse(key: CacheKey): void {
    this.refused.add(key)
  }

  /** Keys currently held by `node`, expired ones excluded. */
  keysOn(node: CacheNode): CacheKey[] {
    const member = this.members.get(formatNode(node))
    if (!member) return []

    return [...member.entries].filter(([, e]) => !this.isExpired(e)).map(([key]) => key)
  }

  read(node: CacheNode, key: CacheKey): CacheResult<T> {
    const entries = this.reach(node, "get").entries
    const entry = entries.get(key)

    if (entry === undefined) return { kind: "miss" }

    if (this.isExpired(entry)) {
      entries.delete(key)
      return { kind: "miss" }
    }

    return { kind: "hit", value: entry.value }
  }

  write(node: CacheNode, key: CacheKey, value: T, ttl: CacheTtl | undefined): boolean {
    const entries = this.reach(node, "set").entries

    if (this.refused.has(key)) return false

    entries.delete(key)

    if (ttl === undefined) {
      entries.set(key, { value })
    } else {
      const expiresAt = expiresAtMs(ttl, this.clock.nowMs())
      if (expiresAt <= this.clock.nowMs()) return true

      entries.set(key, { value, expiresAtMs: expiresAt })
    }

    this.evictOver(entries)

    return true
  }

  remove(node: CacheNode, key: CacheKey): boolean {
    const entries = this.reach(node, "delete").entries
    const entry = entries.get(key)

    entries.delete(key)

    return entry !== undefined && !this.isExpired(entry)
  }

  private reach(node: CacheNode, operation: string): MemoryNode<T> {
    const member = this.members.get(formatNode(node))

    if (!member?.up) {
      throw new NodeUnavailableError(node, operation)
    }

    return member
  }

  private isExpired(entry: MemoryEntry<T>): boolean {
    if (entry.expiresAtMs === undefined) return false

    return entry.expiresAtMs <= this.clock.nowMs()
  }

  private evictOver(entries: Map<CacheKey, MemoryEntry<T>>): void {
    while (entries.size > this.opts.maxEntriesPerNode) {
      const oldest = entries.keys().next()
      if (oldest.done) return

      entries.delete(oldest.value)
    }
  }
}
