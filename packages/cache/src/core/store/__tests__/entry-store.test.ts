import { EntryStore } from "../entry-store"
import { isFresh } from "../freshness"

describe("EntryStore", () => {
  let store: EntryStore<string, number>

  beforeEach(() => {
    store = new EntryStore<string, number>()
  })

  it("returns undefined for keys never installed", () => {
    expect(store.get("sku-1")).toBeUndefined()
    expect(store.size).toBe(0)
  })

  it("keeps at most one entry per key and replaces it wholesale", () => {
    const first = store.install("sku-1", 10, 1_000)
    const second = store.install("sku-1", 12, 2_000)

    expect(store.size).toBe(1)
    expect(store.get("sku-1")).toBe(second)
    expect(first).toEqual({ value: 10, createdAtMs: 1_000 })
  })

  it("hands out frozen entries", () => {
    const entry = store.install("sku-1", 10, 0)

    expect(Object.isFrozen(entry)).toBe(true)
  })
})

describe("isFresh", () => {
  const entry = { value: 1, createdAtMs: 1_000 }

  it("is fresh strictly before createdAt + maxAge", () => {
    expect(isFresh(entry, 1_000, 500)).toBe(true)
    expect(isFresh(entry, 1_499, 500)).toBe(true)
  })

  it("is stale at exactly createdAt + maxAge", () => {
    expect(isFresh(entry, 1_500, 500)).toBe(false)
  })

  it("is never fresh with maxAge 0", () => {
    expect(isFresh(entry, 1_000, 0)).toBe(false)
  })
})
