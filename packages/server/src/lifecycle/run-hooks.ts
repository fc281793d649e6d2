import type { Clock, Milliseconds, UnixMs } from "@bucketfs/clock"
import type { Logger } from "@bucketfs/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
}

export type RunHooksPolicy = {
  /** Stop at the first failing hook. */
  failFast?: boolean
}

export type RunHooksResult = { failures: HookFailure[]; timedOut: boolean }

type HookAttempt = { failure?: HookFailure; timedOut: boolean }

/**
 * Runs hooks one at a time against a shared deadline. Each hook gets an
 * `AbortSignal` that fires when the deadline passes; once it has, the
 * remaining hooks are skipped.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<RunHooksResult> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const attempt = await runOneHook(ctx, hook)

    if (attempt.failure) failures.push(attempt.failure)
    if (attempt.timedOut) return { failures, timedOut: true }
    if (attempt.failure && policy.failFast) return { failures, timedOut: false }
  }

  return { failures, timedOut: false }
}

async function runOneHook(ctx: RunHooksContext, hook: LifecycleHook): Promise<HookAttempt> {
  const label = ctx.phase === "startup" ? "Startup" : "Shutdown"
  const budget = remainingMs(ctx)

  if (budget <= 0) {
    ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks due to timeout`)
    return { timedOut: true }
  }

  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), budget)

  const pastDeadline = () => controller.signal.aborted || remainingMs(ctx) <= 0

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: budget })

    if (pastDeadline()) {
      ctx.logger.warn(`${label} deadline exceeded during hook: ${hook.name}`)
      return { timedOut: true }
    }

    ctx.logger.info(`Executed ${ctx.phase} hook: ${hook.name}`)

    return { timedOut: false }
  } catch (err) {
    ctx.logger.error(`${label} hook failed: ${hook.name}`, { err })

    const failure: HookFailure = { hook: hook.name, error: err }

    if (pastDeadline()) {
      ctx.logger.warn(`${label} deadline exceeded during hook failure: ${hook.name}`)
      return { failure, timedOut: true }
    }

    return { failure, timedOut: false }
  } finally {
    clearTimeout(timer)
  }
}

function remainingMs(ctx: RunHooksContext): Milliseconds {
  return Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())
}
