import type { ItemCode } from "@pricecache/cache"
import { BaseError } from "@pricecache/errors"

export type QuoteErrorCode = "unknown_item" | "quote_aborted"

export class QuoteError extends BaseError<QuoteErrorCode> {
  static unknownItem(itemCode: ItemCode): QuoteError {
    return new QuoteError(`No quote for item "${itemCode}"`, {
      code: "unknown_item",
      context: { itemCode },
      isRetryable: false,
    })
  }

  static aborted(itemCode: ItemCode, reason: unknown): QuoteError {
    return new QuoteError(`Quote for item "${itemCode}" was aborted`, {
      code: "quote_aborted",
      context: { itemCode },
      cause: reason,
    })
  }
}
