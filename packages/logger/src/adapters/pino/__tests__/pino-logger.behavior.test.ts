import { Writable } from "node:stream"
import pino from "pino"
import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { service: "svc-1" })

    logger.info("hello", { operation: "sync" })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload).toMatchObject({ msg: "hello", service: "svc-1", operation: "sync" })
    expect(typeof payload.time).toBe("number")
    expect(payload.level).toBe(30)
  })

  it("defaults to the info level", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination })

    logger.debug("ignored")
    logger.info("logged")

    expect(lines).toHaveLength(1)
  })

  it("child() inherits the base logger sink and config", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { service: "svc-1" })
    const child = base.child({ module: "mod-1" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      msg: "logged",
      service: "svc-1",
      module: "mod-1",
    })
  })

  it("serializes err with its type, message and report", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })
    const err = new TypeError("bad input", { cause: new Error("empty field") })

    logger.error("validation failed", { err })

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload.err.type).toBe("TypeError")
    expect(payload.err.message).toBe("bad input")
    expect(payload.err.report).toBe("bad input: empty field")
  })

  it("caps the report at maxErrorDepth", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger(
      { destination },
      { level: "info", multilineErrors: true, maxErrorDepth: 1 },
    )
    const err = new Error("c", { cause: new Error("b", { cause: new Error("a") }) })

    logger.error("failed", { err })

    expect(JSON.parse(lines[0] ?? "{}").err.report).toBe("c\n\nCaused by:\n      b")
  })

  it("applies error options on top of an injected base logger", () => {
    const { lines, destination } = makeLineDestination()
    const base = pino({ level: "info" }, destination)
    const logger = new PinoLogger({ base }, { multilineErrors: true }, { service: "svc-1" })
    const err = new Error("b", { cause: new Error("a") })

    logger.error("failed", { err })

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload.service).toBe("svc-1")
    expect(payload.err.report).toBe("b\n\nCaused by:\n      a")
  })

  it("child() keeps the parent's error options", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { multilineErrors: true, maxErrorDepth: 1 })
    const err = new Error("c", { cause: new Error("b", { cause: new Error("a") }) })

    logger.child({ module: "mod-1" }).error("failed", { err })

    expect(JSON.parse(lines[0] ?? "{}").err.report).toBe("c\n\nCaused by:\n      b")
  })

  it("logs non-Error err values unchanged", () => {
    const { lines, destination } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    logger.error("failed", { err: "plain string" })

    expect(JSON.parse(lines[0] ?? "{}").err).toBe("plain string")
  })
})
