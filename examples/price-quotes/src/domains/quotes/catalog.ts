import type { ItemCode, Price } from "@pricecache/cache"

export const defaultCatalog: ReadonlyMap<ItemCode, Price> = new Map([
  ["sku-1001", 4.99],
  ["sku-1002", 12.5],
  ["sku-1003", 0.89],
  ["sku-2001", 149],
  ["sku-2002", 74.25],
])
