/**
 * Synchronous text destination that a report is rendered into.
 *
 * @remarks
 * A sink reports failure by throwing. Rendering does not catch: the first
 * failed write aborts the render and the thrown value reaches the caller
 * unchanged. Text written before the failure stays written.
 */
export interface Sink {
  write(chunk: string): void
}
