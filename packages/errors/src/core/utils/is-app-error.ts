import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/**
 * Type guard to check if a value is an AppError.
 *
 * @example
 * ```ts
 * try {
 *   report.renderDisplay(sink)
 * } catch (err) {
 *   if (isAppError(err)) {
 *     console.log(err.code, err.context)
 *   }
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
