function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function getCause(v: unknown): unknown {
  return isRecord(v) && "cause" in v ? v.cause : undefined
}

export const DEFAULT_MAX_CHAIN_DEPTH = 50

/**
 * Walk the `cause` chain of a thrown value, outermost first.
 *
 * Stops at the first missing cause, at a value already visited (cycles) or
 * after `maxDepth` entries.
 *
 * @example
 * ```ts
 * const messages = errorChain(err).map((e) => (e instanceof Error ? e.message : String(e)))
 * ```
 */
export function errorChain(
  err: unknown,
  maxDepth: number = DEFAULT_MAX_CHAIN_DEPTH,
): unknown[] {
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
