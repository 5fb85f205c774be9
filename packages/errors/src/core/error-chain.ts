function causeOf(v: unknown): unknown {
  return typeof v === "object" && v !== null && "cause" in v ? v.cause : undefined
}

/**
 * Walk the `cause` chain starting at `err` (inclusive).
 *
 * Stops at `maxDepth` entries or on a cycle.
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
    current = causeOf(current)
  }

  return chain
}

/**
 * First entry of the cause chain that satisfies `guard`.
 *
 * @example
 * ```ts
 * const reply = findInChain(err, (e): e is ErrorReply => e instanceof ErrorReply)
 * ```
 */
export function findInChain<T>(err: unknown, guard: (e: unknown) => e is T): T | undefined {
  for (const e of errorChain(err)) {
    if (guard(e)) return e
  }
  return undefined
}
