import type { Milliseconds } from "@bucketfs/clock"
import type { Application } from "../server/application"
import type { ReadinessCheck, ResolvedHealthConfig } from "../server/server-options"

const NO_CACHE_HEADERS = {
  "Cache-Control": "no-store, no-cache, must-revalidate",
} as const

export type CheckOutcome = "ok" | "failed" | "timeout" | "error"

export type ReadinessBody =
  | { ok: true; checks: Record<string, CheckOutcome> }
  | { ok: false; reason: "starting" }
  | { ok: false; reason: "checks_failed"; checks: Record<string, CheckOutcome> }

export function registerHealthRoutes(
  app: Application,
  config: ResolvedHealthConfig,
  isReady: () => boolean,
): void {
  if (!config.enabled) return

  app.get(config.livenessPath, (c) => c.json({ ok: true }, { headers: NO_CACHE_HEADERS }))

  app.get(config.readinessPath, async (c) => {
    if (!isReady()) {
      return c.json<ReadinessBody>(
        { ok: false, reason: "starting" },
        { status: 503, headers: NO_CACHE_HEADERS },
      )
    }

    const checks: Record<string, CheckOutcome> = {}

    for (const check of config.readinessChecks) {
      checks[check.name] = await runCheck(check, check.timeoutMs ?? config.checkTimeoutMs)
    }

    if (Object.values(checks).every((outcome) => outcome === "ok")) {
      return c.json<ReadinessBody>({ ok: true, checks }, { headers: NO_CACHE_HEADERS })
    }

    return c.json<ReadinessBody>(
      { ok: false, reason: "checks_failed", checks },
      { status: 503, headers: NO_CACHE_HEADERS },
    )
  })
}

async function runCheck(check: ReadinessCheck, timeoutMs: Milliseconds): Promise<CheckOutcome> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)

  try {
    const healthy = await check.fn(controller.signal)

    if (controller.signal.aborted) return "timeout"

    return healthy ? "ok" : "failed"
  } catch {
    return controller.signal.aborted ? "timeout" : "error"
  } finally {
    clearTimeout(timer)
  }
}
