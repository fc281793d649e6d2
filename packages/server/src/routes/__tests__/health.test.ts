import { Hono } from "hono"
import type { ReadinessCheck, ResolvedHealthConfig } from "../../server/server-options"
import { registerHealthRoutes } from "../health"

describe("health routes", () => {
  function buildApp(
    checks: ReadinessCheck[] = [],
    isReady: () => boolean = () => true,
    checkTimeoutMs = 5_000,
  ): Hono {
    const app = new Hono()
    const config: ResolvedHealthConfig = {
      enabled: true,
      livenessPath: "/health",
      readinessPath: "/ready",
      readinessChecks: checks,
      checkTimeoutMs,
    }

    registerHealthRoutes(app, config, isReady)

    return app
  }

  describe("liveness", () => {
    it("answers 200 without caching", async () => {
      const res = await buildApp().request("/health")

      expect(res.status).toBe(200)
      expect(await res.json()).toStrictEqual({ ok: true })
      expect(res.headers.get("cache-control")).toBe("no-store, no-cache, must-revalidate")
    })

    it("answers even while the server is starting", async () => {
      const res = await buildApp([], () => false).request("/health")

      expect(res.status).toBe(200)
    })

    it("registers nothing when disabled", async () => {
      const app = new Hono()

      registerHealthRoutes(app, { enabled: false }, () => true)

      expect((await app.request("/health")).status).toBe(404)
      expect((await app.request("/ready")).status).toBe(404)
    })
  })

  describe("readiness", () => {
    it("answers 503 while the server is starting", async () => {
      const res = await buildApp([], () => false).request("/ready")

      expect(res.status).toBe(503)
      expect(await res.json()).toStrictEqual({ ok: false, reason: "starting" })
    })

    it("answers 200 with every check reported", async () => {
      const res = await buildApp([{ name: "storage", fn: async () => true }]).request("/ready")

      expect(res.status).toBe(200)
      expect(await res.json()).toStrictEqual({ ok: true, checks: { storage: "ok" } })
    })

    it("reports failed and throwing checks", async () => {
      const app = buildApp([
        { name: "storage", fn: async () => false },
        {
          name: "other",
          fn: async () => {
            throw new Error("boom")
          },
        },
        { name: "fine", fn: async () => true },
      ])

      const res = await app.request("/ready")

      expect(res.status).toBe(503)
      expect(await res.json()).toStrictEqual({
        ok: false,
        reason: "checks_failed",
        checks: { storage: "failed", other: "error", fine: "ok" },
      })
    })

    it("reports a check that outlives its timeout", async () => {
      const slow: ReadinessCheck = {
        name: "slow",
        timeoutMs: 10,
        fn: (signal) =>
          new Promise((resolve) => {
            signal.addEventListener("abort", () => resolve(true), { once: true })
          }),
      }

      const res = await buildApp([slow]).request("/ready")

      expect(res.status).toBe(503)
      expect(await res.json()).toMatchObject({ checks: { slow: "timeout" } })
    })
  })
})
