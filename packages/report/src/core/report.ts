import { inspect } from "node:util"
import { causeInspector } from "../adapters/inspectors/cause-inspector"
import { StringSink } from "../adapters/sinks/string-sink"
import type { ErrorInspector } from "../ports/inspector"
import type { FormatReportOptions, ReportOptions } from "../ports/report-options"
import type { Sink } from "../ports/sink"
import { IndentedSink } from "./indented-sink"
import { DEFAULT_MAX_DEPTH, sourceChain } from "./source-chain"

type ResolvedReportOptions = Readonly<{
  inspector: ErrorInspector
  maxDepth: number
}>

/**
 * Renders an error together with its chain of causes.
 *
 * A report is either single-line (the default):
 *
 * ```text
 * Failed to load settings: Could not read file: ENOENT
 * ```
 *
 * or, after `.pretty(true)`, multi-line, with causes numbered when there is
 * more than one:
 *
 * ```text
 * Failed to load settings
 *
 * Caused by:
 *    0: Could not read file
 *    1: ENOENT
 * ```
 *
 * Every text conversion (`toString()`, `console.log`/`util.inspect`,
 * `JSON.stringify`) produces the same rendering, so a report can be handed to
 * any generic printing path.
 *
 * @example
 * ```ts
 * try {
 *   await loadSettings()
 * } catch (err) {
 *   console.error(`Error: ${Report.from(err).pretty(true)}`)
 * }
 * ```
 */
export class Report<E = unknown> {
  private constructor(
    private readonly root: E,
    private readonly multiline: boolean,
    private readonly options: ResolvedReportOptions,
  ) {}

  /** Wrap `error` in a single-line report. */
  static from<E>(error: E, options: ReportOptions = {}): Report<E> {
    return new Report(error, false, {
      inspector: options.inspector ?? causeInspector(),
      maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    })
  }

  /** Alias of {@link Report.from}. */
  static new<E>(error: E, options: ReportOptions = {}): Report<E> {
    return Report.from(error, options)
  }

  get error(): E {
    return this.root
  }

  get isPretty(): boolean {
    return this.multiline
  }

  /**
   * Returns a report rendered across multiple lines when `pretty` is true.
   *
   * @remarks
   * The receiver is left unchanged; use the returned report.
   */
  pretty(pretty: boolean): Report<E> {
    return new Report(this.root, pretty, this.options)
  }

  renderDisplay(sink: Sink): void {
    if (this.multiline) {
      this.renderMultiline(sink)
    } else {
      this.renderSingleLine(sink)
    }
  }

  /** Identical to {@link Report.renderDisplay}. */
  renderDebug(sink: Sink): void {
    this.renderDisplay(sink)
  }

  toString(): string {
    const sink = new StringSink()
    this.renderDisplay(sink)
    return sink.toString()
  }

  toJSON(): string {
    return this.toString()
  }

  [inspect.custom](): string {
    const sink = new StringSink()
    this.renderDebug(sink)
    return sink.toString()
  }

  private renderSingleLine(sink: Sink): void {
    const { inspector } = this.options

    sink.write(inspector.display(this.root))

    for (const cause of this.causes()) {
      sink.write(": ")
      sink.write(inspector.display(cause))
    }
  }

  private renderMultiline(sink: Sink): void {
    const { inspector } = this.options

    sink.write(inspector.display(this.root))

    const causes = this.causes()
    if (causes.length === 0) return

    sink.write("\n\nCaused by:")

    const multiple = causes.length > 1

    for (const [index, cause] of causes.entries()) {
      sink.write("\n")

      const indented = new IndentedSink(sink)
      indented.write(multiple ? `${String(index).padStart(4)}: ` : "      ")
      indented.write(inspector.display(cause))
    }
  }

  private causes(): unknown[] {
    return sourceChain(this.root, this.options.inspector, this.options.maxDepth)
  }
}

/**
 * Render `error` and its causes to a string in one call.
 *
 * @example
 * ```ts
 * formatReport(err, { pretty: true })
 * ```
 */
export function formatReport(error: unknown, options: FormatReportOptions = {}): string {
  const { pretty = false, ...reportOptions } = options

  return Report.from(error, reportOptions).pretty(pretty).toString()
}
