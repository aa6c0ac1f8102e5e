import type { ItemCode, Price, PriceService } from "@pricecache/cache"
import type { Clock, Milliseconds } from "@pricecache/clock"
import type { Logger } from "@pricecache/logger"

import { QuoteError } from "./quote.errors"

export type SimulatedQuoteServiceDeps = {
  clock: Clock
  logger: Logger
}

export type SimulatedQuoteServiceOptions = {
  /** Delay before every answer. */
  latencyMs: Milliseconds
  catalog: ReadonlyMap<ItemCode, Price>
}

/**
 * Stand-in for a slow pricing backend: answers from a fixed catalog after
 * `latencyMs`, and gives up when the caller aborts.
 */
export class SimulatedQuoteService implements PriceService {
  public constructor(
    private readonly deps: SimulatedQuoteServiceDeps,
    private readonly opts: SimulatedQuoteServiceOptions,
  ) {}

  async getPriceFor(itemCode: ItemCode, signal?: AbortSignal): Promise<Price> {
    await this.deps.clock.sleep(this.opts.latencyMs, signal)

    if (signal?.aborted) throw QuoteError.aborted(itemCode, signal.reason)

    const price = this.opts.catalog.get(itemCode)
    if (price === undefined) throw QuoteError.unknownItem(itemCode)

    this.deps.logger.debug("Quote served", { itemCode })

    return price
  }
}
