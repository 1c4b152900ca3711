export type InFlightKey = string

/**
 * - "leader": this caller ran the function
 * - "inflight": this caller joined a call another caller started
 */
export type FlightSource = "leader" | "inflight"

export interface FlightResult<T> {
  value: T

  /** Number of callers that joined the leader's flight. */
  sharedWith: number

  source: FlightSource
}

/**
 * Deduplicates concurrent work by key.
 *
 * Callers that arrive while a call for the same key is in flight share its
 * outcome, value or rejection alike. Once the flight settles the key is free
 * again; nothing is remembered.
 *
 * @example
 * ```ts
 * const flights = new MemorySingleflight<NodeList>()
 *
 * // one discovery, three waiters
 * await Promise.all([
 *   flights.run("discovery:0", discover),
 *   flights.run("discovery:0", discover),
 *   flights.run("discovery:0", discover),
 * ])
 * ```
 */
export interface Singleflight<T = unknown> {
  run(key: InFlightKey, fn: () => Promise<T>): Promise<FlightResult<T>>

  /**
   * Detach the in-flight call for `key`, if any. Its current waiters still
   * get its outcome; the next caller starts a new flight.
   */
  forget(key: InFlightKey): void

  has(key: InFlightKey): boolean

  readonly size: number
}
