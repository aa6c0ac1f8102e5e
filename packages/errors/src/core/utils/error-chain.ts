function getCause(v: unknown): unknown {
  if (typeof v !== "object" || v === null || !("cause" in v)) return undefined

  return v.cause
}

/**
 * Walk the error cause chain and return all values encountered, outermost
 * first.
 *
 * Stops after `maxDepth` links and on the first cycle.
 */
export function errorChain(err: unknown, maxDepth: number = 50): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  let current: unknown = err

  while (current != null && chain.length < maxDepth) {
    if (typeof current === "object") {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)
    current = getCause(current)
  }

  return chain
}

/**
 * First value in the cause chain of `err` that satisfies `predicate`.
 *
 * @example
 * ```ts
 * const timeout = findInChain(err, (e) => e instanceof DeadlineExceededError)
 * ```
 */
export function findInChain<T>(
  err: unknown,
  predicate: (value: unknown) => value is T,
): T | undefined {
  for (const link of errorChain(err)) {
    if (predicate(link)) return link
  }

  return undefined
}
