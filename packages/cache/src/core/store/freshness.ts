import type { Milliseconds } from "@pricecache/clock"

import type { StoredEntry } from "../../ports/cache-entry"

export function isFresh(
  entry: StoredEntry<unknown>,
  nowMs: Milliseconds,
  maxAgeMs: Milliseconds,
): boolean {
  return nowMs < entry.createdAtMs + maxAgeMs
}
