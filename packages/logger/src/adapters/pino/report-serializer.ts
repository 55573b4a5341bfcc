import { type FormatReportOptions, formatReport } from "@causeway/report"
import { errWithCause, type SerializedError } from "pino-std-serializers"

export type ReportedError = SerializedError & {
  /** The error and its causes rendered by `formatReport`. */
  report: string
}

/**
 * Builds a pino `err` serializer.
 *
 * `Error` values are serialized with `errWithCause` and gain a `report`
 * property; any other value is logged as-is.
 */
export function createErrSerializer(options: FormatReportOptions = {}) {
  return (err: unknown): unknown => {
    if (!(err instanceof Error)) return err

    const serialized: ReportedError = Object.assign(errWithCause(err), {
      report: formatReport(err, options),
    })

    return serialized
  }
}
