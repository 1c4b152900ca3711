import type { FlightResult, InFlightKey, Singleflight } from "../../ports/single-flight"

type InFlight<T> = {
  promise: Promise<T>
  followers: number
}

export class MemorySingleflight<T = unknown> implements Singleflight<T> {
  private readonly flights = new Map<InFlightKey, InFlight<T>>()

  async run(key: InFlightKey, fn: () => Promise<T>): Promise<FlightResult<T>> {
    const existing = this.flights.get(key)

    if (existing) {
      existing.followers++
      const value = await existing.promise

      return { value, sharedWith: existing.followers, source: "inflight" }
    }

    const promise = fn()
    const flight: InFlight<T> = { promise, followers: 0 }

    this.flights.set(key, flight)

    try {
      const value = await promise

      return { value, sharedWith: flight.followers, source: "leader" }
    } finally {
      if (this.flights.get(key) === flight) {
        this.flights.delete(key)
      }
    }
  }

  forget(key: InFlightKey): void {
    this.flights.delete(key)
  }

  has(key: InFlightKey): boolean {
    return this.flights.has(key)
  }

  get size(): number {
    return this.flights.size
  }
}
