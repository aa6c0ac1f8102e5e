import type { ItemCode } from "./cache-key"

export type Price = number

/**
 * Upstream lookup the cache sits in front of.
 *
 * @remarks
 * - Calls are assumed to be slow and independent of each other.
 * - The cache never retries; a rejected call is reported as-is.
 * - `signal` is aborted when the cache stops waiting for the call
 *   (lookup deadline). Implementations should stop work when it fires.
 */
export interface PriceService {
  getPriceFor(itemCode: ItemCode, signal?: AbortSignal): Promise<Price>
}
