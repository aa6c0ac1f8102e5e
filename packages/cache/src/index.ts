export {
  createPriceCache,
  type CreatePriceCacheOptions,
  DEFAULT_LOOKUP_TIMEOUT_MS,
  type PriceCacheDeps,
} from "./core/create-price-cache"
export { withDeadline } from "./core/deadline/with-deadline"
export {
  BatchError,
  DeadlineExceededError,
  isDeadlineExceeded,
  LookupError,
} from "./core/errors/price-cache-errors"
export { fanOut } from "./core/fan-out/fan-out"
export {
  ReadThroughPriceCache,
  type ReadThroughPriceCacheDeps,
} from "./core/read-through/read-through-price-cache"
export type { CachedPrice, StoredEntry } from "./ports/cache-entry"
export type { ItemCode } from "./ports/cache-key"
export type { PriceCacheOptions, ResultOrder } from "./ports/cache-options"
export type { PriceCache } from "./ports/price-cache"
export type { Price, PriceService } from "./ports/price-service"
