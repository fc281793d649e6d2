import { createPinoLogger } from "@bucketfs/logger"
import { run } from "./server"

run().catch((err: unknown) => {
  createPinoLogger({}, { level: "info" }).fatal("Failed to start", { err })
  process.exitCode = 1
})
