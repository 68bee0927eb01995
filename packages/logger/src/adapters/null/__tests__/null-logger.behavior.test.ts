import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("accepts every level without output", () => {
    const write = vi.spyOn(process.stdout, "write")
    const logger = createNullLogger()

    logger.trace("t")
    logger.debug("d", { key: "tcp" })
    logger.info("i")
    logger.warn("w", { err: new Error("x") })
    logger.error("e")
    logger.fatal("f")

    expect(write).not.toHaveBeenCalled()
  })

  it("child() returns another NullLogger", () => {
    const child = new NullLogger().child({ module: "entry-map" })

    expect(child).toBeInstanceOf(NullLogger)
  })
})
