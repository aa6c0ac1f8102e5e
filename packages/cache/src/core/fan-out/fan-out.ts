import type { Logger } from "@pricecache/logger"

import type { ItemCode } from "../../ports/cache-key"
import type { ResultOrder } from "../../ports/cache-options"
import { BatchError, LookupError } from "../errors/price-cache-errors"

export type FanOutDeps = {
  logger: Logger
}

export type FanOutOptions = {
  resultOrder: ResultOrder
}

type Completed<T> = {
  index: number
  value: T
}

/**
 * Run `lookup` once per item code, all at the same time.
 *
 * Resolves once every lookup has succeeded. Rejects with a {@link BatchError}
 * on the first failure without waiting for the rest; lookups still running
 * are left alone and whatever they produce is dropped.
 */
export function fanOut<T>(
  itemCodes: readonly ItemCode[],
  lookup: (itemCode: ItemCode) => Promise<T>,
  deps: FanOutDeps,
  opts: FanOutOptions,
): Promise<T[]> {
  if (itemCodes.length === 0) return Promise.resolve([])

  return new Promise<T[]>((resolve, reject) => {
    const completed: Completed<T>[] = []
    let settled = false

    itemCodes.forEach((itemCode, index) => {
      // A lookup that throws synchronously fails like one that rejects.
      const task = async () => await lookup(itemCode)

      void task().then(
        (value) => {
          if (settled) {
            deps.logger.debug("Dropping price from failed batch", { itemCode })
            return
          }

          completed.push({ index, value })

          if (completed.length === itemCodes.length) {
            settled = true
            resolve(ordered(completed, opts.resultOrder))
          }
        },
        (err: unknown) => {
          if (settled) {
            deps.logger.debug("Dropping error from failed batch", { itemCode, err })
            return
          }

          settled = true
          const cause = err instanceof LookupError ? err : new LookupError(itemCode, err)
          reject(new BatchError(cause, itemCodes.length, completed.length))
        },
      )
    })
  })
}

function ordered<T>(completed: readonly Completed<T>[], order: ResultOrder): T[] {
  if (order === "completion") return completed.map((c) => c.value)

  return [...completed].sort((a, b) => a.index - b.index).map((c) => c.value)
}
