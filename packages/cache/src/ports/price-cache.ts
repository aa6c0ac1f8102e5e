import type { CachedPrice } from "./cache-entry"
import type { ItemCode } from "./cache-key"
import type { Price } from "./price-service"

/**
 * Read-through cache over a {@link PriceService}.
 */
export interface PriceCache {
  /**
   * Price for one item.
   *
   * Served from the cache while the stored entry is fresh. Otherwise the
   * upstream service is called and a successful result replaces the entry.
   *
   * @throws LookupError when the upstream call fails or exceeds its deadline.
   * The stored entry, stale or not, is left in place.
   */
  getPriceFor(itemCode: ItemCode): Promise<Price>

  /**
   * Prices for many items, looked up concurrently.
   *
   * All-or-nothing: resolves with one price per requested code (duplicates
   * included) or rejects with a `BatchError` as soon as the first lookup
   * fails, without waiting for the others.
   */
  getPricesFor(...itemCodes: ItemCode[]): Promise<Price[]>

  /** Current entry for `itemCode` without calling upstream. */
  peek(itemCode: ItemCode): CachedPrice | undefined

  /** Number of stored entries, fresh or stale. */
  readonly size: number
}
