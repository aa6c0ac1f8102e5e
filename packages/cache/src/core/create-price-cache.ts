import { type Clock, SystemClock } from "@pricecache/clock"
import { createNullLogger, type Logger } from "@pricecache/logger"
import { MemorySingleflight } from "@pricecache/singleflight"

import type { PriceCacheOptions } from "../ports/cache-options"
import type { PriceCache } from "../ports/price-cache"
import type { Price, PriceService } from "../ports/price-service"
import { ReadThroughPriceCache } from "./read-through/read-through-price-cache"
import { assertNonNegativeMs, assertPositiveMs } from "./validation/validation"

export const DEFAULT_LOOKUP_TIMEOUT_MS = 2000

export type PriceCacheDeps = {
  service: PriceService

  /** @default SystemClock */
  clock?: Clock

  /** @default NullLogger */
  logger?: Logger
}

export type CreatePriceCacheOptions = Pick<PriceCacheOptions, "maxAgeMs"> &
  Partial<Omit<PriceCacheOptions, "maxAgeMs">>

/**
 * Build a read-through {@link PriceCache} in front of `deps.service`.
 *
 * @throws RangeError if `maxAgeMs` is negative or `lookupTimeoutMs` is not
 * positive (either one non-finite).
 *
 * @example
 * ```ts
 * const cache = createPriceCache({ service, logger }, { maxAgeMs: 60_000 })
 *
 * const [a, b] = await cache.getPricesFor("sku-1", "sku-2")
 * ```
 */
export function createPriceCache(
  deps: PriceCacheDeps,
  options: CreatePriceCacheOptions,
): PriceCache {
  const opts: PriceCacheOptions = {
    maxAgeMs: options.maxAgeMs,
    lookupTimeoutMs: options.lookupTimeoutMs ?? DEFAULT_LOOKUP_TIMEOUT_MS,
    singleFlight: options.singleFlight ?? false,
    resultOrder: options.resultOrder ?? "completion",
  }

  assertNonNegativeMs(opts.maxAgeMs, "maxAgeMs")
  assertPositiveMs(opts.lookupTimeoutMs, "lookupTimeoutMs")

  const logger = (deps.logger ?? createNullLogger()).child({ module: "price-cache" })

  return new ReadThroughPriceCache(
    {
      service: deps.service,
      clock: deps.clock ?? new SystemClock(),
      logger,
      ...(opts.singleFlight ? { flights: new MemorySingleflight<Price>() } : {}),
    },
    opts,
  )
}
