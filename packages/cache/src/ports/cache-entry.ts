import type { Milliseconds } from "@pricecache/clock"

import type { ItemCode } from "./cache-key"
import type { Price } from "./price-service"

/**
 * Stored value together with the clock time it was produced at.
 * Entries are replaced wholesale and never mutated.
 */
export type StoredEntry<T> = Readonly<{
  value: T
  createdAtMs: Milliseconds
}>

/**
 * Read-only view of a cached price, as returned by `peek()`.
 */
export type CachedPrice = Readonly<{
  itemCode: ItemCode
  value: Price
  createdAt: Date

  /** Whether the entry would be served without an upstream call right now. */
  isFresh: boolean
}>
