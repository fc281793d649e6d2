import type { Milliseconds } from "@bucketfs/clock"
import type { Logger } from "@bucketfs/logger"
import type { StopResult } from "./shutdown"

type ProcessListener = (...args: unknown[]) => void

/**
 * The slice of `process` the handlers need.
 */
export interface SignalTarget {
  on(event: string, listener: ProcessListener): unknown
  off(event: string, listener: ProcessListener): unknown
  exit(code: number): void
}

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<StopResult>

  /** @default 10_000 */
  fatalTimeoutMs?: Milliseconds

  /** @default process */
  target?: SignalTarget
}

export interface SignalHandler {
  unregister: () => void
}

const GRACEFUL_SIGNALS = ["SIGINT", "SIGTERM"] as const
const FATAL_EVENTS = ["uncaughtException", "unhandledRejection"] as const

/**
 * SIGINT and SIGTERM stop the server once; repeats are ignored. An uncaught
 * exception or unhandled rejection stops it too, then exits with 1, forcing
 * the exit when the stop outlives `fatalTimeoutMs`.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const target = ctx.target ?? process
  const fatalTimeoutMs = ctx.fatalTimeoutMs ?? 10_000

  let stopping = false

  const onSignal = (signal: string): void => {
    ctx.logger.info("Received signal", { signal })

    if (stopping) return
    stopping = true

    ctx.logger.warn("Shutdown triggered", { reason: signal })
    void runStop(ctx, signal)
  }

  const onFatal = (reason: string, err: unknown): void => {
    if (stopping) {
      ctx.logger.fatal("Fatal error during shutdown", { reason, err })
      target.exit(1)
      return
    }

    stopping = true
    ctx.logger.fatal("Fatal error", { reason, err })

    void fatalShutdown(ctx, target, fatalTimeoutMs, reason)
  }

  const listeners = new Map<string, ProcessListener>()

  for (const signal of GRACEFUL_SIGNALS) {
    listeners.set(signal, () => onSignal(signal))
  }

  for (const event of FATAL_EVENTS) {
    listeners.set(event, (err) => onFatal(event, err))
  }

  for (const [event, listener] of listeners) target.on(event, listener)

  return {
    unregister: () => {
      for (const [event, listener] of listeners) target.off(event, listener)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers

async function fatalShutdown(
  ctx: SignalHandlerContext,
  target: SignalTarget,
  fatalTimeoutMs: Milliseconds,
  reason: string,
): Promise<void> {
  const timer = setTimeout(() => {
    ctx.logger.fatal("Forced exit after timeout", { timeoutMs: fatalTimeoutMs })
    target.exit(1)
  }, fatalTimeoutMs)

  timer.unref()

  try {
    await runStop(ctx, reason)
  } finally {
    clearTimeout(timer)
  }

  target.exit(1)
}

async function runStop(ctx: SignalHandlerContext, reason: string): Promise<void> {
  if (!ctx.stop) {
    ctx.logger.warn("No stop handler registered", { reason })
    return
  }

  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
  }
}
