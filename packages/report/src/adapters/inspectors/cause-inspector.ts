import { isObjectLike, safeString } from "../../core/utils/inspect-value"
import type { ErrorInspector } from "../../ports/inspector"

export type CauseInspectorOptions = Readonly<{
  /**
   * Prefix `Error` messages with the error's name, e.g. `"TypeError: boom"`.
   * @default false
   */
  includeName?: boolean
}>

/**
 * Inspector for the standard `Error.cause` chain.
 *
 * Display:
 * - `Error` instances: their `message` (optionally prefixed with `name`)
 * - strings: verbatim
 * - objects and functions with a string `message`: that message
 * - anything else: `String(value)`, or its `[object Tag]` when that throws
 *
 * The `cause` property of any object or function is followed, whether or not
 * it is an `Error`.
 */
export function causeInspector(options: CauseInspectorOptions = {}): ErrorInspector {
  const includeName = options.includeName ?? false

  return {
    display(error: unknown): string {
      if (error instanceof Error) {
        return includeName ? `${error.name}: ${error.message}` : error.message
      }
      if (typeof error === "string") return error
      if (isObjectLike(error) && "message" in error && typeof error.message === "string") {
        return error.message
      }

      return safeString(error)
    },

    source(error: unknown): unknown {
      return isObjectLike(error) && "cause" in error ? error.cause : undefined
    },
  }
}
