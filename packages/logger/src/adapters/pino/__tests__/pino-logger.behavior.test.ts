import { Writable } from "node:stream"
import { LogLevels } from "../../../ports/log-level"
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

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { collection: "users" },
    )

    logger.info("Request completed", { method: "GET", status: 200 })

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0]!)

    expect(payload).toMatchObject({
      msg: "Request completed",
      collection: "users",
      method: "GET",
      status: 200,
    })

    expect(typeof payload.time).toBe("number")
    expect(payload.level).toBe(LogLevels.Info)
  })

  it("child() inherits the base logger sink and config", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { collection: "users" })
    const child = base.child({ operation: "put" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)

    const payload = JSON.parse(lines[0]!)

    expect(payload).toMatchObject({
      msg: "logged",
      collection: "users",
      operation: "put",
    })
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })
    const cause = new Error("socket hang up")

    logger.error("Request failed", { err: new Error("transport failed", { cause }) })

    const payload = JSON.parse(lines[0]!)

    expect(payload.err.type).toBe("Error")
    expect(payload.err.message).toBe("transport failed")
    expect(payload.err.cause.message).toBe("socket hang up")
  })
})
