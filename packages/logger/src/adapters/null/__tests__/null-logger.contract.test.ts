import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("accepts every level without output or error", () => {
    const logger = new NullLogger()

    expect(() => {
      logger.trace("x")
      logger.debug("x")
      logger.info("x")
      logger.warn("x", { attempt: 1 })
      logger.error("x", { err: new Error("x") })
      logger.fatal("x")
    }).not.toThrow()
  })

  it("child() returns another no-op logger", () => {
    const child = createNullLogger().child({ dbName: "CONFIG_DB" })

    expect(child).toBeInstanceOf(NullLogger)
  })
})
