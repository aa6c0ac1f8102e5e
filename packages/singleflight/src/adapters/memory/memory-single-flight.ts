import type { FlightKey, FlightResult, Singleflight } from "../../ports/single-flight"

type Flight<T> = {
  promise: Promise<T>
  followers: number
}

export class MemorySingleflight<T> implements Singleflight<T> {
  private readonly flights = new Map<FlightKey, Flight<T>>()

  async run(key: FlightKey, fn: () => Promise<T>): Promise<FlightResult<T>> {
    const existing = this.flights.get(key)
    if (existing) return this.join(existing)

    const flight: Flight<T> = { promise: fn(), followers: 0 }
    this.flights.set(key, flight)

    try {
      const value = await flight.promise

      return { value, isLeader: true, sharedWith: flight.followers, source: "leader" }
    } finally {
      this.flights.delete(key)
    }
  }

  private async join(flight: Flight<T>): Promise<FlightResult<T>> {
    flight.followers++
    const value = await flight.promise

    return { value, isLeader: false, sharedWith: flight.followers, source: "inflight" }
  }
}
