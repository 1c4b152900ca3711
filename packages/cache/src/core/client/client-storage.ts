import { AsyncLocalStorage } from "node:async_hooks"
import type { ClientScope, ClientStorage, StoredClient } from "../../ports/client-storage"

type Slot<C> = { id: string; entry: StoredClient<C> | undefined }

/**
 * One slot for the lifetime of the cache instance.
 */
export class InstanceClientStorage<C> implements ClientStorage<C> {
  private readonly slot: Slot<C> = { id: "instance", entry: undefined }

  get(): StoredClient<C> | undefined {
    return this.slot.entry
  }

  set(entry: StoredClient<C>): void {
    this.slot.entry = entry
  }

  clear(): void {
    this.slot.entry = undefined
  }

  slotId(): string {
    return this.slot.id
  }

  run<R>(fn: () => R): R {
    return fn()
  }
}

/**
 * One slot per async execution context opened with `run()`. Code outside
 * any context shares a fallback slot.
 */
export class ContextClientStorage<C> implements ClientStorage<C> {
  private readonly als = new AsyncLocalStorage<Slot<C>>()
  private readonly shared: Slot<C> = { id: "shared", entry: undefined }
  private opened = 0

  get(): StoredClient<C> | undefined {
    return this.slot().entry
  }

  set(entry: StoredClient<C>): void {
    this.slot().entry = entry
  }

  clear(): void {
    this.slot().entry = undefined
  }

  slotId(): string {
    return this.slot().id
  }

  run<R>(fn: () => R): R {
    this.opened++

    return this.als.run({ id: `scope-${this.opened}`, entry: undefined }, fn)
  }

  private slot(): Slot<C> {
    return this.als.getStore() ?? this.shared
  }
}

export function createClientStorage<C>(scope: ClientScope): ClientStorage<C> {
  switch (scope) {
    case "instance":
      return new InstanceClientStorage<C>()
    case "context":
      return new ContextClientStorage<C>()
  }
}
