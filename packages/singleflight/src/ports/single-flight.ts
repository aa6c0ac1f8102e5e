export type FlightKey = string

/**
 * Where the result originated from
 * - "leader": this caller executed the function
 * - "inflight": this caller joined a call started by another
 */
export type FlightSource = "leader" | "inflight"

export interface FlightResult<T> {
  value: T

  /** Whether this caller executed the function */
  isLeader: boolean

  /** Number of other callers that shared this result (excluding leader) */
  sharedWith: number

  source: FlightSource
}

/**
 * Deduplicates concurrent work per key.
 *
 * Calls to `run()` with a key that already has a call in flight join that
 * call and settle with its outcome (shared fate, errors included). Once the
 * call settles the key is free again; nothing is cached.
 *
 * @example
 * ```ts
 * const flights = new MemorySingleflight<Price>()
 *
 * // one upstream request, three callers
 * await Promise.all([
 *   flights.run("sku-1", () => service.getPriceFor("sku-1")),
 *   flights.run("sku-1", () => service.getPriceFor("sku-1")),
 *   flights.run("sku-1", () => service.getPriceFor("sku-1")),
 * ])
 * ```
 */
export interface Singleflight<T> {
  run(key: FlightKey, fn: () => Promise<T>): Promise<FlightResult<T>>
}
