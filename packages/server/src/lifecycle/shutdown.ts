import type { Clock, UnixMs } from "@bucketfs/clock"
import type { Logger } from "@bucketfs/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error | null) => void) => void
}

export type ShutdownContext = {
  server: Closeable
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  stopHooks: LifecycleHook[]
}

export type StopResult = {
  /** No hook failed and the deadline held. */
  ok: boolean
  failures: HookFailure[]

  /**
   * The deadline passed before the listener closed or before every stop
   * hook ran. Open sockets are not force-closed.
   */
  timedOut: boolean
}

export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  ctx.logger.warn("Shutting down gracefully...")

  const hooks: LifecycleHook[] = [createCloseServerHook(ctx.server), ...ctx.stopHooks]

  const { failures, timedOut } = await runHooks(
    {
      phase: "shutdown",
      clock: ctx.clock,
      logger: ctx.logger,
      deadlineMs: ctx.deadlineMs,
    },
    hooks,
    { failFast: false },
  )

  const ok = failures.length === 0 && !timedOut

  ctx.logger.info("Shutdown complete", { ok, failures: failures.length, timedOut })

  return { ok, failures, timedOut }
}

function createCloseServerHook(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: async ({ signal }) => {
      const res = await closeServerUntilAborted(server, signal)

      if (res.aborted) return
      if (res.error) throw res.error
    },
  }
}

function closeServerOnce(server: Closeable): Promise<{ error?: unknown }> {
  return new Promise((resolve) => {
    server.close((err) => resolve({ error: err ?? undefined }))
  })
}

const ABORTED = Symbol("aborted")

type CloseUntilAbortedResult = { aborted: true } | { aborted: false; error?: unknown }

/** Resolves on close, or as soon as the shutdown budget runs out. */
async function closeServerUntilAborted(
  server: Closeable,
  signal: AbortSignal,
): Promise<CloseUntilAbortedResult> {
  if (signal.aborted) return { aborted: true }

  let onAbort: (() => void) | undefined

  const abortedPromise = new Promise<typeof ABORTED>((resolve) => {
    onAbort = () => resolve(ABORTED)
    signal.addEventListener("abort", onAbort, { once: true })
  })

  try {
    const res = await Promise.race([closeServerOnce(server), abortedPromise])

    if (res === ABORTED) return { aborted: true }

    return { aborted: false, error: res.error }
  } finally {
    if (onAbort) signal.removeEventListener("abort", onAbort)
  }
}

export type ShutdownFn = typeof shutdown
