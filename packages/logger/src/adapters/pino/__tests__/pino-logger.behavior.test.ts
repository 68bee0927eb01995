import { Writable } from "node:stream"
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

function parse(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "{}")
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { service: "enr" },
    )

    logger.info("entry set", { key: "tcp", size: 3 })

    expect(lines).toHaveLength(1)

    const payload = parse(lines[0])

    expect(payload).toMatchObject({
      msg: "entry set",
      service: "enr",
      key: "tcp",
      size: 3,
    })
    expect(typeof payload.time).toBe("number")
    expect(payload.level).toBe(30)
  })

  it("filters entries below the configured level", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "warn" })

    logger.debug("dropped")
    logger.info("dropped")
    logger.warn("kept")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0]).msg).toBe("kept")
  })

  it("child() inherits the base logger sink and config", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { service: "enr" })
    const child = base.child({ module: "entry-map" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({
      msg: "logged",
      service: "enr",
      module: "entry-map",
    })
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })
    const cause = new Error("input value has wrong size 5, want 4")

    logger.warn("entry decode failed", {
      key: "ip",
      err: new Error("ENR key \"ip\": bad", { cause }),
    })

    expect(parse(lines[0]).err).toMatchObject({
      type: "Error",
      message: "ENR key \"ip\": bad",
      cause: { message: "input value has wrong size 5, want 4" },
    })
  })
})
