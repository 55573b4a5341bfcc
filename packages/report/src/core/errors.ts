import { BaseError, type ErrorContext } from "@causeway/errors"

export type ReportErrorCode = "sink_write_failed" | "invalid_report_config"

/** A sink rejected a write. Thrown by the built-in sinks; rendering never catches it. */
export class SinkError extends BaseError<"sink_write_failed"> {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super(message, { code: "sink_write_failed", ...options })
  }
}

export class ReportConfigError extends BaseError<"invalid_report_config"> {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super(message, { code: "invalid_report_config", ...options })
  }
}
