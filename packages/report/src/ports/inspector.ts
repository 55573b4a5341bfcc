/**
 * Strategy that gives any thrown value a display string and a predecessor.
 *
 * Chain members can be any value: `Error`s, strings, plain objects, or
 * library-specific error shapes.
 */
export interface ErrorInspector {
  /** Human-readable text for one link of the chain. Must not throw. */
  display(error: unknown): string

  /**
   * The value `error` reports as its reason.
   * Returning `undefined` or `null` ends the chain.
   */
  source(error: unknown): unknown
}

/**
 * Error-like value that describes itself.
 *
 * Implement this on error types that do not follow the standard `cause`
 * property, then render them with `reportableInspector`.
 */
export interface Reportable {
  display(): string
  source(): Reportable | undefined
}
