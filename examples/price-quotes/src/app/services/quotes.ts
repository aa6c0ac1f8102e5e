import { createPriceCache, type PriceCache, type PriceService } from "@pricecache/cache"

import { defaultCatalog } from "../../domains/quotes/catalog"
import { SimulatedQuoteService } from "../../domains/quotes/simulated-quote-service"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type QuoteServices = {
  quoteService: PriceService
  priceCache: PriceCache
}

export function createQuoteServices(
  config: AppConfig,
  core: CoreServices,
  quoteService?: PriceService,
): QuoteServices {
  const upstream =
    quoteService ??
    new SimulatedQuoteService(
      { clock: core.clock, logger: core.logger },
      { latencyMs: config.quotes.latencyMs, catalog: defaultCatalog },
    )

  const priceCache = createPriceCache(
    { service: upstream, clock: core.clock, logger: core.logger },
    config.priceCache,
  )

  return { quoteService: upstream, priceCache }
}
