import type { FlightResult, InFlightKey, Singleflight } from "../../ports/single-flight"

interface InFlight<T> {
  promise: Promise<T>
  followerCount: number
}

export class MemorySingleflight<T> implements Singleflight<T> {
  private readonly flights = new Map<InFlightKey, InFlight<T>>()

  async run(key: InFlightKey, fn: () => Promise<T>): Promise<FlightResult<T>> {
    const existing = this.flights.get(key)

    if (existing) {
      existing.followerCount++
      const value = await existing.promise

      return {
        value,
        isLeader: false,
        sharedWith: existing.followerCount,
        source: "inflight",
      }
    }

    const flight: InFlight<T> = { promise: fn(), followerCount: 0 }

    this.flights.set(key, flight)

    try {
      const value = await flight.promise

      return {
        value,
        isLeader: true,
        sharedWith: flight.followerCount,
        source: "leader",
      }
    } finally {
      // a forgotten flight may already have been replaced by a newer one
      if (this.flights.get(key) === flight) {
        this.flights.delete(key)
      }
    }
  }

  forget(key: InFlightKey): void {
    this.flights.delete(key)
  }

  get size(): number {
    return this.flights.size
  }
}
