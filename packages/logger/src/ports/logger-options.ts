import type { LogLevelName } from "./log-level"

/**
 * Configuration options for a Logger instance.
 *
 * @remarks
 * These options define *policy*, not behavior. Adapters must honor them but
 * are free to choose how.
 */
export type LoggerOptions = {
  /**
   * Minimum log level to emit.
   * Example: "info" will suppress "trace" and "debug" logs.
   */
  level: LogLevelName

  /**
   * Pretty-print log output for human readability.
   * Intended for local development; keep structured JSON in production.
   */
  prettify?: boolean

  /**
   * Render the `err` report with one cause per line.
   * @default prettify
   */
  multilineErrors?: boolean

  /**
   * Maximum number of causes rendered in the `err` report.
   * @default 50
   */
  maxErrorDepth?: number
}
