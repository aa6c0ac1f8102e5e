/**
 * Identifies one priced item. Treated as an opaque string: two codes are the
 * same key only if they are equal strings.
 *
 * @example
 * ```ts
 * const itemCode: ItemCode = "sku-1042"
 * ```
 */
export type ItemCode = string
