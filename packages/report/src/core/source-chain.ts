import type { ErrorInspector } from "../ports/inspector"
import { isObjectLike } from "./utils/inspect-value"

export const DEFAULT_MAX_DEPTH = 50

/**
 * Walk the predecessors of `error`, outermost first. The root itself is not included.
 *
 * Safety:
 * - stops after `maxDepth` causes
 * - stops when an object already visited (the root included) reappears
 *
 * @example
 * ```ts
 * const outer = new Error("outer", { cause: new Error("inner") })
 *
 * sourceChain(outer, causeInspector()).map((e) => (e as Error).message) // ["inner"]
 * ```
 */
export function sourceChain(
  error: unknown,
  inspector: ErrorInspector,
  maxDepth: number = DEFAULT_MAX_DEPTH,
): unknown[] {
  const chain: unknown[] = []
  const seen = new WeakSet<object>()

  if (isObjectLike(error)) seen.add(error)

  let current: unknown = inspector.source(error)

  while (current != null && chain.length < maxDepth) {
    if (isObjectLike(current)) {
      if (seen.has(current)) break
      seen.add(current)
    }

    chain.push(current)
    current = inspector.source(current)
  }

  return chain
}
