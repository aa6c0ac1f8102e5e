import type { ItemCode, Price } from "@pricecache/cache"

import { type AppContextOptions, createAppContext } from "./app/create-context"

export async function run(
  itemCodes: ItemCode[],
  options: AppContextOptions = {},
): Promise<Price[]> {
  const ctx = await createAppContext(options)
  const { logger, clock } = ctx.services.core
  const startedAtMs = clock.nowMs()

  const prices = await ctx.services.quotes.priceCache.getPricesFor(...itemCodes)

  logger.info("Prices resolved", {
    itemCodes,
    prices,
    durationMs: clock.nowMs() - startedAtMs,
  })

  return prices
}
