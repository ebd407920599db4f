import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("accepts every level without output or error", () => {
    const logger = createNullLogger()

    expect(() => {
      logger.trace("x")
      logger.debug("x")
      logger.info("x")
      logger.warn("x", { key: "k" })
      logger.error("x", { err: new Error("e") })
      logger.fatal("x")
    }).not.toThrow()
  })

  it("child() stays a no-op logger", () => {
    expect(new NullLogger().child({ module: "ufs" })).toBeInstanceOf(NullLogger)
  })
})
