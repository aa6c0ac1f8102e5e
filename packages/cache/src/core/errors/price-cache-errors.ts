import type { Milliseconds } from "@pricecache/clock"
import { BaseError, findInChain } from "@pricecache/errors"

import type { ItemCode } from "../../ports/cache-key"

export class DeadlineExceededError extends BaseError<"deadline_exceeded"> {
  constructor(itemCode: ItemCode, timeoutMs: Milliseconds) {
    super(`Price lookup for "${itemCode}" exceeded ${timeoutMs}ms`, {
      code: "deadline_exceeded",
      context: { itemCode, timeoutMs },
      isRetryable: true,
    })
  }
}

export class LookupError extends BaseError<"lookup_failed"> {
  readonly itemCode: ItemCode

  constructor(itemCode: ItemCode, cause: unknown) {
    super(`Price lookup for "${itemCode}" failed`, {
      code: "lookup_failed",
      context: { itemCode },
      cause,
      isRetryable: isDeadlineExceeded(cause),
    })

    this.itemCode = itemCode
  }
}

export class BatchError extends BaseError<"batch_failed"> {
  constructor(cause: LookupError, requested: number, completed: number) {
    super(`Batch of ${requested} price lookups failed: ${cause.message}`, {
      code: "batch_failed",
      context: { requested, completed, itemCode: cause.itemCode },
      cause,
      isRetryable: cause.isRetryable,
    })
  }
}

/**
 * Whether `err`, or anything in its cause chain, is a lookup deadline.
 */
export function isDeadlineExceeded(err: unknown): boolean {
  return (
    findInChain(err, (e): e is DeadlineExceededError => e instanceof DeadlineExceededError) !==
    undefined
  )
}
