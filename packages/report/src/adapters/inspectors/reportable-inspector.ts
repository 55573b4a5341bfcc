import { safeString } from "../../core/utils/inspect-value"
import type { ErrorInspector, Reportable } from "../../ports/inspector"

export function isReportable(v: unknown): v is Reportable {
  if (typeof v !== "object" || v === null) return false

  return (
    "display" in v &&
    typeof v.display === "function" &&
    "source" in v &&
    typeof v.source === "function"
  )
}

/**
 * Inspector for values implementing {@link Reportable}.
 * Anything else is shown with `String(value)` (its `[object Tag]` when that
 * throws) and ends the chain.
 */
export const reportableInspector: ErrorInspector = {
  display(error: unknown): string {
    return isReportable(error) ? error.display() : safeString(error)
  },

  source(error: unknown): unknown {
    return isReportable(error) ? error.source() : undefined
  },
}
