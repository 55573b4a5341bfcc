import type { Sink } from "../../ports/sink"

/** In-memory sink. Never fails. */
export class StringSink implements Sink {
  private readonly chunks: string[] = []

  write(chunk: string): void {
    this.chunks.push(chunk)
  }

  clear(): void {
    this.chunks.length = 0
  }

  toString(): string {
    return this.chunks.join("")
  }
}
