import { ObjectStoreError } from "@objectfs/errors"
import { PinoLogger } from "../pino-logger"
import { captureDestination } from "./pino-harness"

describe("PinoLogger behavior", () => {
  it("writes msg, numeric level and bound context as JSON", () => {
    const { captured, destination } = captureDestination()

    const logger = new PinoLogger({ destination }, { level: "info" }, { service: "objectfs" })
    logger.info("listed", { key: "logs/", durationMs: 12 })

    expect(captured).toHaveLength(1)
    expect(captured[0]?.payload).toMatchObject({
      msg: "listed",
      level: 30,
      service: "objectfs",
      key: "logs/",
      durationMs: 12,
    })
    expect(typeof captured[0]?.payload.time).toBe("number")
  })

  it("serializes err with its message and type", () => {
    const { captured, destination } = captureDestination()
    const logger = new PinoLogger({ destination }, { level: "trace" })

    logger.error("copy failed", {
      err: ObjectStoreError.permanent("Access Denied", { status: 403 }),
    })

    expect(captured[0]?.payload.err).toMatchObject({
      type: "ObjectStoreError",
      message: "Access Denied",
    })
  })

  it("child() shares the destination and level of its parent", () => {
    const { captured, destination } = captureDestination()

    const child = new PinoLogger({ destination }, { level: "warn" }).child({ module: "ufs" })
    child.info("ignored")
    child.warn("kept")

    expect(captured.map((c) => c.payload.msg)).toEqual(["kept"])
    expect(captured[0]?.payload.module).toBe("ufs")
  })
})
