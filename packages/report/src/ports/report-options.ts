import type { ErrorInspector } from "./inspector"

export type ReportOptions = Readonly<{
  /**
   * How chain members are displayed and linked.
   * @default causeInspector()
   */
  inspector?: ErrorInspector

  /**
   * Maximum number of causes rendered below the root error.
   * The walk also stops when a value it already visited reappears.
   * @default 50
   */
  maxDepth?: number
}>

export type FormatReportOptions = ReportOptions &
  Readonly<{
    /** Render each cause on its own line under a "Caused by:" header. */
    pretty?: boolean
  }>
