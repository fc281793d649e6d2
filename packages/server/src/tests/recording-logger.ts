import type { LogBindings, Logger, LogLevelName, LogMeta } from "@bucketfs/logger"

export type LogRecord = {
  level: LogLevelName
  message: string
  bindings: LogBindings
  meta?: LogMeta
}

/**
 * Keeps every entry, child loggers included, in one shared list.
 */
export class RecordingLogger implements Logger {
  constructor(
    readonly records: LogRecord[] = [],
    private readonly bindings: LogBindings = {},
  ) {}

  trace(message: string, meta?: LogMeta): void {
    this.record("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta): void {
    this.record("debug", message, meta)
  }

  info(message: string, meta?: LogMeta): void {
    this.record("info", message, meta)
  }

  warn(message: string, meta?: LogMeta): void {
    this.record("warn", message, meta)
  }

  error(message: string, meta?: LogMeta): void {
    this.record("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta): void {
    this.record("fatal", message, meta)
  }

  child<U extends LogBindings>(bindings: U): RecordingLogger {
    return new RecordingLogger(this.records, { ...this.bindings, ...bindings })
  }

  messages(level?: LogLevelName): string[] {
    return this.records.filter((r) => !level || r.level === level).map((r) => r.message)
  }

  private record(level: LogLevelName, message: string, meta?: LogMeta): void {
    this.records.push({ level, message, bindings: this.bindings, ...(meta && { meta }) })
  }
}
