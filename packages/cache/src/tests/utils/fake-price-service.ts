import type { ItemCode } from "../../ports/cache-key"
import type { Price, PriceService } from "../../ports/price-service"
import { type Deferred, deferred } from "./deferred"

/**
 * In-process price service for tests.
 *
 * Codes answer immediately with their configured price or failure, unless
 * they are held: calls for a held code stay pending until `release()` or
 * `releaseError()` settles the oldest one.
 */
export class FakePriceService implements PriceService {
  readonly calls: ItemCode[] = []
  readonly signals: AbortSignal[] = []

  private readonly prices = new Map<ItemCode, Price>()
  private readonly failures = new Map<ItemCode, Error>()
  private readonly holding = new Set<ItemCode>()
  private readonly held = new Map<ItemCode, Deferred<Price>[]>()

  setPrice(itemCode: ItemCode, price: Price): this {
    this.failures.delete(itemCode)
    this.prices.set(itemCode, price)
    return this
  }

  fail(itemCode: ItemCode, error: Error): this {
    this.failures.set(itemCode, error)
    return this
  }

  hold(itemCode: ItemCode): this {
    this.holding.add(itemCode)
    return this
  }

  release(itemCode: ItemCode, price: Price): void {
    this.next(itemCode).resolve(price)
  }

  releaseError(itemCode: ItemCode, error: Error): void {
    this.next(itemCode).reject(error)
  }

  callCount(itemCode?: ItemCode): number {
    if (itemCode === undefined) return this.calls.length

    return this.calls.filter((c) => c === itemCode).length
  }

  async getPriceFor(itemCode: ItemCode, signal?: AbortSignal): Promise<Price> {
    this.calls.push(itemCode)
    if (signal) this.signals.push(signal)

    if (this.holding.has(itemCode)) {
      const call = deferred<Price>()
      this.held.set(itemCode, [...(this.held.get(itemCode) ?? []), call])
      return await call.promise
    }

    const failure = this.failures.get(itemCode)
    if (failure) throw failure

    const price = this.prices.get(itemCode)
    if (price === undefined) throw new Error(`No price for ${itemCode}`)

    return price
  }

  private next(itemCode: ItemCode): Deferred<Price> {
    const [call, ...rest] = this.held.get(itemCode) ?? []
    if (call === undefined) throw new Error(`No held call for ${itemCode}`)

    this.held.set(itemCode, rest)
    return call
  }
}
