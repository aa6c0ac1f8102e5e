import { randomUUID } from "node:crypto"

import type { Clock } from "@pricecache/clock"
import type { Logger } from "@pricecache/logger"
import type { Singleflight } from "@pricecache/singleflight"

import type { CachedPrice, StoredEntry } from "../../ports/cache-entry"
import type { ItemCode } from "../../ports/cache-key"
import type { PriceCacheOptions } from "../../ports/cache-options"
import type { PriceCache } from "../../ports/price-cache"
import type { Price, PriceService } from "../../ports/price-service"
import { withDeadline } from "../deadline/with-deadline"
import { DeadlineExceededError, LookupError } from "../errors/price-cache-errors"
import { fanOut } from "../fan-out/fan-out"
import { EntryStore } from "../store/entry-store"
import { isFresh } from "../store/freshness"

export type ReadThroughPriceCacheDeps = {
  service: PriceService
  clock: Clock
  logger: Logger

  /** When set, concurrent misses for one item share a single upstream call. */
  flights?: Singleflight<Price>
}

export class ReadThroughPriceCache implements PriceCache {
  private readonly store = new EntryStore<ItemCode, Price>()

  public constructor(
    private readonly deps: ReadThroughPriceCacheDeps,
    private readonly opts: PriceCacheOptions,
  ) {}

  async getPriceFor(itemCode: ItemCode): Promise<Price> {
    const entry = this.store.get(itemCode)

    if (entry !== undefined && this.isFresh(entry)) {
      this.deps.logger.debug("Price cache hit", { itemCode })
      return entry.value
    }

    this.deps.logger.debug(entry === undefined ? "Price cache miss" : "Price stale", {
      itemCode,
    })

    return await this.load(itemCode)
  }

  async getPricesFor(...itemCodes: ItemCode[]): Promise<Price[]> {
    if (itemCodes.length === 0) return []

    const logger = this.deps.logger.child({
      batchId: randomUUID(),
      batchSize: itemCodes.length,
    })
    const startedAtMs = this.deps.clock.nowMs()

    const prices = await fanOut(
      itemCodes,
      (itemCode) => this.getPriceFor(itemCode),
      { logger },
      { resultOrder: this.opts.resultOrder },
    )

    logger.debug("Batch completed", { durationMs: this.deps.clock.nowMs() - startedAtMs })

    return prices
  }

  peek(itemCode: ItemCode): CachedPrice | undefined {
    const entry = this.store.get(itemCode)
    if (entry === undefined) return undefined

    return Object.freeze({
      itemCode,
      value: entry.value,
      createdAt: new Date(entry.createdAtMs),
      isFresh: this.isFresh(entry),
    })
  }

  get size(): number {
    return this.store.size
  }

  private async load(itemCode: ItemCode): Promise<Price> {
    const flights = this.deps.flights
    if (flights === undefined) return await this.lookupAndInstall(itemCode)

    const result = await flights.run(itemCode, () => this.lookupAndInstall(itemCode))

    if (!result.isLeader) {
      this.deps.logger.debug("Joined in-flight price lookup", { itemCode })
    }

    return result.value
  }

  private async lookupAndInstall(itemCode: ItemCode): Promise<Price> {
    const { clock, logger, service } = this.deps
    const timeoutMs = this.opts.lookupTimeoutMs
    const startedAtMs = clock.nowMs()

    let value: Price
    try {
      value = await withDeadline(
        (signal) => service.getPriceFor(itemCode, signal),
        { sleeper: clock },
        { timeoutMs, onTimeout: () => new DeadlineExceededError(itemCode, timeoutMs) },
      )
    } catch (err) {
      const error = new LookupError(itemCode, err)
      logger.warn("Price lookup failed", {
        itemCode,
        err: error,
        durationMs: clock.nowMs() - startedAtMs,
      })
      throw error
    }

    this.store.install(itemCode, value, clock.nowMs())
    logger.debug("Price installed", { itemCode, durationMs: clock.nowMs() - startedAtMs })

    return value
  }

  private isFresh(entry: StoredEntry<Price>): boolean {
    return isFresh(entry, this.deps.clock.nowMs(), this.opts.maxAgeMs)
  }
}
