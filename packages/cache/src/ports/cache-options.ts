import type { Milliseconds } from "@pricecache/clock"

/**
 * - "completion": prices in the order their lookups finished
 * - "request": prices in the order the item codes were passed
 */
export type ResultOrder = "completion" | "request"

export type PriceCacheOptions = {
  /**
   * How long an entry stays fresh after it was produced.
   *
   * An entry created at `t0` is served until `t0 + maxAgeMs` (exclusive).
   * `0` disables caching; every read calls upstream.
   */
  maxAgeMs: Milliseconds

  /**
   * Upper bound on a single upstream call.
   *
   * @default 2000
   */
  lookupTimeoutMs: Milliseconds

  /**
   * Share one upstream call between concurrent misses for the same item.
   *
   * @default false
   */
  singleFlight: boolean

  /** @default "completion" */
  resultOrder: ResultOrder
}
