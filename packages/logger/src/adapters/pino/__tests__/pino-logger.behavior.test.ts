import { Writable } from "node:stream"
import { BaseError } from "@picfetch/errors"
import { createPinoLogger, PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = String(chunk).trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

describe("PinoLogger behavior", () => {
  it("emits JSON with msg, time and numeric level", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { service: "image-loader" },
    )

    logger.info("hello", { key: "https://cdn.test/a.png" })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload).toMatchObject({
      msg: "hello",
      level: 30,
      service: "image-loader",
      key: "https://cdn.test/a.png",
    })
    expect(typeof payload.time).toBe("number")
  })

  it("child() inherits the base logger sink and level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { env: "test" })
    const child = base.child({ module: "image-loader" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      msg: "logged",
      env: "test",
      module: "image-loader",
    })
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()
    const logger = createPinoLogger({ destination }, { level: "info" })

    const err = new BaseError("fetch failed", {
      code: "network_error",
      cause: new Error("ECONNRESET"),
    })

    logger.warn("load failed", { err })

    const payload = JSON.parse(lines[0] ?? "{}")

    expect(payload.err.message).toBe("fetch failed")
    expect(payload.err.code).toBe("network_error")
    expect(payload.err.cause.message).toBe("ECONNRESET")
  })

  it("defaults to info when no level is given", () => {
    const { lines, destination } = makeLineDestination()
    const logger = createPinoLogger({ destination })

    logger.debug("hidden")
    logger.info("shown")

    expect(lines).toHaveLength(1)
  })
})
