import type { Sink } from "../ports/sink"

/** Indent applied to continuation lines of a cause. Matches the width of `"   0: "`. */
export const CAUSE_INDENT = "      "

/**
 * Sink adapter that indents every line after a newline.
 *
 * Each `"\n"` in a written chunk is forwarded followed by `indent`, so
 * multi-line cause messages stay nested under their entry. The first line
 * of every chunk is written as-is; this holds across any number of writes.
 */
export class IndentedSink implements Sink {
  constructor(
    private readonly inner: Sink,
    private readonly indent: string = CAUSE_INDENT,
  ) {}

  write(chunk: string): void {
    const lines = chunk.split("\n")

    for (const [i, line] of lines.entries()) {
      if (i > 0) {
        this.inner.write("\n")
        this.inner.write(this.indent)
      }

      if (line) this.inner.write(line)
    }
  }
}
