import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Structured JSON otherwise.
   */
  prettify?: boolean

  /**
   * Paths (pino redact syntax) whose values are replaced before output,
   * e.g. `["headers.authorization"]`.
   */
  redact?: string[]
}
