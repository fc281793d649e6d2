import { type Clock, SystemClock } from "@bucketfs/clock"
import { createPinoLogger, type Logger } from "@bucketfs/logger"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
  clock: Clock
}

export function createCoreServices(config: AppConfig): CoreServices {
  const clock = new SystemClock()

  const logger = createPinoLogger(
    { service: config.app.serviceName },
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
      redact: ["headers.authorization"],
    },
  )

  return { clock, logger }
}
