import { z } from "zod"
import { causeInspector } from "../../adapters/inspectors/cause-inspector"
import { ReportConfigError } from "../errors"
import { Report } from "../report"
import { mapEnvToConfig, type ReportConfig, reportEnvSchema } from "./schema"

export type LoadReportConfigOptions = {
  /** Variables to read. Defaults to `process.env`. */
  env?: Record<string, string | undefined>

  /** Values applied after the environment; these always win. */
  overrides?: Partial<ReportConfig>
}

/**
 * Read report settings from the environment.
 *
 * | variable              | type        | default |
 * | --------------------- | ----------- | ------- |
 * | `REPORT_PRETTY`       | boolean     | `false` |
 * | `REPORT_MAX_DEPTH`    | integer > 0 | `50`    |
 * | `REPORT_INCLUDE_NAME` | boolean     | `false` |
 *
 * @throws {ReportConfigError} when a variable fails validation
 */
export function loadReportConfig(options: LoadReportConfigOptions = {}): ReportConfig {
  const env = options.env ?? process.env
  const result = reportEnvSchema.safeParse(env)

  if (!result.success) {
    const keys = [
      ...new Set(result.error.issues.map((issue) => issue.path.map(String).join("."))),
    ]

    throw new ReportConfigError(
      `Report configuration validation failed:\n${z.prettifyError(result.error)}`,
      { context: { keys } },
    )
  }

  return { ...mapEnvToConfig(result.data), ...stripUndefined(options.overrides ?? {}) }
}

/** Build a factory that wraps errors in reports configured by `config`. */
export function createReporter(config: ReportConfig): <E>(error: E) => Report<E> {
  const inspector = causeInspector({ includeName: config.includeName })

  return (error) =>
    Report.from(error, { inspector, maxDepth: config.maxDepth }).pretty(config.pretty)
}

function stripUndefined(obj: Partial<ReportConfig>): Partial<ReportConfig> {
  const out: Partial<ReportConfig> = {}
  if (obj.pretty !== undefined) out.pretty = obj.pretty
  if (obj.maxDepth !== undefined) out.maxDepth = obj.maxDepth
  if (obj.includeName !== undefined) out.includeName = obj.includeName
  return out
}
