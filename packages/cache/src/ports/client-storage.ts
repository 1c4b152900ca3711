/**
 * - "instance": one client per cache instance.
 * - "context": one client per async execution context opened with
 *   `runInScope()`.
 */
export type ClientScope = "instance" | "context"

export type StoredClient<C> = Readonly<{
  client: C

  /** Membership generation the client was built from. */
  generation: number
}>

/**
 * Where the client cache keeps its handle.
 */
export interface ClientStorage<C> {
  get(): StoredClient<C> | undefined
  set(entry: StoredClient<C>): void
  clear(): void

  /**
   * Identifies the slot `get()` currently reads. Construction is only
   * shared between callers on the same slot.
   */
  slotId(): string

  /**
   * Run `fn` with a storage slot of its own, where the strategy has any.
   */
  run<R>(fn: () => R): R
}
