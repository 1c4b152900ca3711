function causeOf(value: unknown): unknown {
  return typeof value === "object" && value !== null && "cause" in value
    ? value.cause
    : undefined
}

/**
 * Walk the `cause` chain of a thrown value, outermost first.
 *
 * Stops at `maxDepth` entries or at the first value already visited.
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
 * First error in the chain of `err` that is an instance of `type`.
 */
export function findInChain<E extends Error>(
  err: unknown,
  type: abstract new (...args: never[]) => E,
): E | undefined {
  for (const link of errorChain(err)) {
    if (link instanceof type) return link
  }

  return undefined
}
