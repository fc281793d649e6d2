import { PinoLogger } from "../pino-logger"
import { captureLines } from "./pino-harness"

describe("PinoLogger behavior", () => {
  it("writes JSON entries with bindings and message", () => {
    const { lines, destination } = captureLines()

    const logger = new PinoLogger(
      { destination },
      { level: "info" },
      { service: "bucketfs" },
    )

    logger.info("bucket created", { bucket: "docs" })

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      msg: "bucket created",
      service: "bucketfs",
      bucket: "docs",
      level: 30,
    })
    expect(typeof lines[0]?.time).toBe("number")
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = captureLines()
    const logger = new PinoLogger({ destination }, { level: "info" })

    const cause = new Error("EACCES: permission denied")
    logger.error("write failed", { err: new Error("io failure", { cause }) })

    const err = lines[0]?.err

    expect(err).toMatchObject({
      type: "Error",
      message: "io failure",
      cause: { message: "EACCES: permission denied" },
    })
  })

  it("redacts configured paths", () => {
    const { lines, destination } = captureLines()
    const logger = new PinoLogger(
      { destination },
      { level: "info", redact: ["headers.authorization"] },
    )

    logger.info("incoming", { headers: { authorization: "Basic test-secret" } })

    expect(lines[0]?.headers).toEqual({ authorization: "[redacted]" })
  })

  it("child() shares the parent sink and level", () => {
    const { lines, destination } = captureLines()
    const base = new PinoLogger({ destination }, { level: "warn" })

    const child = base.child({ requestId: "r-1" })
    child.info("dropped")
    child.warn("kept")

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({ msg: "kept", requestId: "r-1" })
  })
})
