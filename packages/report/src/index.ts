export { causeInspector, type CauseInspectorOptions } from "./adapters/inspectors/cause-inspector"
export { isReportable, reportableInspector } from "./adapters/inspectors/reportable-inspector"
export { FdSink, type FdSinkDeps, type FdWriter, stderrSink, stdoutSink } from "./adapters/sinks/fd-sink"
export { StringSink } from "./adapters/sinks/string-sink"
export {
  createReporter,
  type LoadReportConfigOptions,
  loadReportConfig,
} from "./core/config/load-report-config"
export { type ReportConfig, type ReportEnv, reportEnvSchema } from "./core/config/schema"
export { ReportConfigError, type ReportErrorCode, SinkError } from "./core/errors"
export { CAUSE_INDENT, IndentedSink } from "./core/indented-sink"
export { formatReport, Report } from "./core/report"
export { DEFAULT_MAX_DEPTH, sourceChain } from "./core/source-chain"
export type { ErrorInspector, Reportable } from "./ports/inspector"
export type { FormatReportOptions, ReportOptions } from "./ports/report-options"
export type { Sink } from "./ports/sink"
