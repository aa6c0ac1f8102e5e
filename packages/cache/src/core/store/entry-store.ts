import type { Milliseconds } from "@pricecache/clock"

import type { StoredEntry } from "../../ports/cache-entry"

/**
 * Keyed store of immutable entries. At most one entry per key.
 *
 * @remarks
 * Every method is synchronous. Callers never await between reading and
 * installing an entry, so on a single event loop each install is atomic and
 * readers observe either the previous entry or the new one.
 */
export class EntryStore<K, T> {
  private readonly entries = new Map<K, StoredEntry<T>>()

  get(key: K): StoredEntry<T> | undefined {
    return this.entries.get(key)
  }

  /** Replace whatever is stored under `key`. */
  install(key: K, value: T, createdAtMs: Milliseconds): StoredEntry<T> {
    const entry: StoredEntry<T> = Object.freeze({ value, createdAtMs })
    this.entries.set(key, entry)

    return entry
  }

  get size(): number {
    return this.entries.size
  }
}
