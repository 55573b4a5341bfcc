import { writeSync } from "node:fs"
import type { Sink } from "../../ports/sink"
import { SinkError } from "../../core/errors"

export type FdWriter = (
  fd: number,
  buffer: Uint8Array,
  offset: number,
  length: number,
) => number

export type FdSinkDeps = {
  /** Synchronous writer returning the number of bytes written. Defaults to `fs.writeSync`. */
  writeSync?: FdWriter
}

/**
 * Writes straight to a file descriptor with blocking writes.
 *
 * Each chunk is encoded as UTF-8 and written until every byte is out; short
 * writes continue from where the previous call stopped. A failed write is
 * rethrown as {@link SinkError} carrying the descriptor in its context and the
 * system error as `cause`.
 */
export class FdSink implements Sink {
  private readonly writer: FdWriter

  constructor(
    readonly fd: number,
    deps: FdSinkDeps = {},
  ) {
    this.writer = deps.writeSync ?? writeSync
  }

  write(chunk: string): void {
    const buffer = Buffer.from(chunk, "utf8")
    let offset = 0

    while (offset < buffer.length) {
      let written: number
      try {
        written = this.writer(this.fd, buffer, offset, buffer.length - offset)
      } catch (err) {
        throw new SinkError(`Failed to write to file descriptor ${this.fd}`, {
          context: { fd: this.fd },
          cause: err,
        })
      }

      if (written <= 0) {
        throw new SinkError(`File descriptor ${this.fd} accepted no bytes`, {
          context: { fd: this.fd, offset, length: buffer.length },
        })
      }

      offset += written
    }
  }
}

export function stdoutSink(deps: FdSinkDeps = {}): FdSink {
  return new FdSink(1, deps)
}

export function stderrSink(deps: FdSinkDeps = {}): FdSink {
  return new FdSink(2, deps)
}
