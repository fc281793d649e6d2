import type { LogBindings } from "../ports/log-context"
import type { Logger } from "../ports/logger"
import type { LoggerOptions } from "../ports/logger-options"
import { NullLogger } from "./null/null-logger"
import { type PinoLoggerDeps, PinoLogger } from "./pino/pino-logger"

export function createPinoLogger(
  bindings: LogBindings,
  opts: Partial<LoggerOptions>,
  deps: PinoLoggerDeps = {},
): Logger {
  return new PinoLogger(deps, opts, bindings)
}

export function createNullLogger(): Logger {
  return new NullLogger()
}
