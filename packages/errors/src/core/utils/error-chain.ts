function getCause(v: unknown): unknown {
  if (typeof v !== "object" || v === null || !("cause" in v)) return undefined

  return v.cause
}

/**
 * Walk the error cause chain and return all values encountered, outermost first.
 *
 * Stops at `maxDepth` entries (default 50) or when a value repeats.
 *
 * @example
 * ```ts
 * catch (err) {
 *   const fields = errorChain(err).filter(isAppError).map((e) => e.context.field)
 * }
 * ```
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

    const next = getCause(current)

    if (next === undefined) break
    current = next
  }

  return chain
}

/**
 * The innermost value of the cause chain, or `err` itself when it has no cause.
 */
export function rootCause(err: unknown): unknown {
  const chain = errorChain(err)

  return chain.length > 0 ? chain[chain.length - 1] : err
}
