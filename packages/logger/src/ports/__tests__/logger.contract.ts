import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ service: "billing" })
      const child = parent.child({ module: "invoices" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ service: "billing", module: "invoices" })
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ service: "billing" })
      const child = parent.child({ module: "invoices" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).not.toHaveProperty("module")
      expect(logs[1]?.payload).toMatchObject({ service: "billing", module: "invoices" })
    })

    it("level filtering: logs below configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["warn", "error"])
    })

    it("err carries the single-line report of its cause chain", () => {
      const { logger, read } = h.make({ level: "trace" })
      const err = new Error("sync failed", { cause: new Error("timeout") })

      logger.error("job failed", { err })

      expect(read()[0]?.payload.err).toMatchObject({ report: "sync failed: timeout" })
    })

    it("err carries the multi-line report when multilineErrors is set", () => {
      const { logger, read } = h.make({ level: "trace", multilineErrors: true })
      const err = new Error("sync failed", { cause: new Error("timeout") })

      logger.error("job failed", { err })

      expect(read()[0]?.payload.err).toMatchObject({
        report: "sync failed\n\nCaused by:\n      timeout",
      })
    })
  })
}
