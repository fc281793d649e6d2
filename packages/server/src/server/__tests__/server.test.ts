import { FakeClock } from "@bucketfs/clock"
import { BaseError } from "@bucketfs/errors"
import type { Logger } from "@bucketfs/logger"
import { mock } from "vitest-mock-extended"
import { createErrorHandler } from "../../errors/create-error-handler"
import { type BuildAppContext, buildApp } from "../../lifecycle/build-app"
import { createStopper } from "../../lifecycle/create-stopper"
import type { LifecycleHook } from "../../lifecycle/lifecycle-hook"
import type { Closeable, StopResult } from "../../lifecycle/shutdown"
import { shutdown } from "../../lifecycle/shutdown"
import type { SignalHandlerContext } from "../../lifecycle/signals"
import { type StartupContext, startup } from "../../lifecycle/startup"
import { createDefaultMiddleware } from "../../middleware/create-default-middleware"
import type { Mock } from "../../tests/mock"
import { Server, type ServerCollaborators, ServerError } from "../server"
import { resolveOptions, type ServerOptions } from "../server-options"

describe("Server", () => {
  let logger: Mock<Logger>
  let clock: FakeClock
  let order: string[]
  let closeable: Closeable
  let collabs: ServerCollaborators
  let unregister: ReturnType<typeof vi.fn>

  beforeEach(() => {
    logger = mock<Logger>()
    clock = new FakeClock(1_000)
    order = []
    closeable = { close: (cb) => cb?.() }
    unregister = vi.fn()

    collabs = {
      onStartup: vi.fn((ctx: StartupContext) => {
        order.push("startup")
        return startup(ctx)
      }),
      onShutdown: shutdown,
      listen: vi.fn(() => {
        order.push("listen")
        return closeable
      }),
      buildApp: vi.fn((ctx: BuildAppContext) => {
        order.push("build")
        return buildApp(ctx)
      }),
      createStopper,
      setupProcessHandlers: vi.fn(() => ({ unregister })),
      createDefaultMiddleware,
      createErrorHandler,
    }
  })

  function makeServer(overrides: Partial<ServerOptions> = {}): Server {
    const options = resolveOptions({
      port: 8001,
      host: "127.0.0.1",
      requestLogging: { enabled: false },
      errorHandling: {
        kind: "mappings",
        config: { mappings: { bucket_not_found: { status: 404 } } },
      },
      routes: (app) => {
        app.get("/hello", (c) => c.json({ hello: "world" }))
        app.get("/missing", () => {
          throw new BaseError("Bucket 'x' not found", { code: "bucket_not_found" })
        })
      },
      ...overrides,
    })

    return new Server({ logger, clock }, options, collabs)
  }

  describe("build", () => {
    it("makes the app answer requests without listening", async () => {
      const server = makeServer().build()

      const res = await server.app.request("/hello")

      expect(res.status).toBe(200)
      expect(await res.json()).toEqual({ hello: "world" })
      expect(res.headers.get("x-request-id")).toEqual(expect.any(String))
      expect(collabs.listen).not.toHaveBeenCalled()
    })

    it("wires the error handler", async () => {
      const server = makeServer().build()

      const res = await server.app.request("/missing")

      expect(res.status).toBe(404)
      expect(await res.json()).toMatchObject({
        error: { code: "bucket_not_found", message: "Bucket 'x' not found" },
      })
    })

    it("is idempotent", () => {
      const server = makeServer()

      expect(server.build().build()).toBe(server)
      expect(collabs.buildApp).toHaveBeenCalledOnce()
      expect(server.isBuilt()).toBe(true)
    })

    it("reports not ready until started", async () => {
      const server = makeServer().build()

      expect((await server.app.request("/ready")).status).toBe(503)
      expect(server.isReady()).toBe(false)
    })
  })

  describe("start", () => {
    it("runs start hooks, builds, then listens", async () => {
      const hook: LifecycleHook = { name: "start:storage", fn: async () => void order.push("hook") }
      const server = makeServer({ startHooks: [hook] })

      const handle = await server.start()

      expect(order).toEqual(["startup", "hook", "build", "listen"])
      expect(handle.address).toEqual({ host: "127.0.0.1", port: 8001 })
      expect(server.getState()).toBe("started")
      expect(server.isReady()).toBe(true)
      expect((await server.app.request("/ready")).status).toBe(200)
    })

    it("computes the startup deadline from the clock", async () => {
      await makeServer({ startupTimeoutMs: 5_000 }).start()

      expect(collabs.onStartup).toHaveBeenCalledWith(
        expect.objectContaining({ deadlineMs: 6_000 }),
      )
    })

    it("does not build twice after an explicit build", async () => {
      const server = makeServer().build()

      await server.start()

      expect(collabs.buildApp).toHaveBeenCalledOnce()
    })

    it("refuses to start twice", async () => {
      const server = makeServer()
      await server.start()

      await expect(server.start()).rejects.toMatchObject({ code: "server_already_started" })
    })

    it("fails without listening when a start hook fails", async () => {
      const server = makeServer({
        startHooks: [
          {
            name: "start:storage",
            fn: async () => {
              throw new Error("read-only file system")
            },
          },
        ],
      })

      const err = await server.start().catch((e: unknown) => e)

      expect(err).toBeInstanceOf(ServerError)
      expect(err).toMatchObject({
        code: "startup_failed",
        context: { failedHooks: ["start:storage"], timedOut: false },
      })
      expect(collabs.listen).not.toHaveBeenCalled()
      expect(server.getState()).toBe("idle")
      expect(server.isReady()).toBe(false)
    })

    it("returns to idle when listening throws", async () => {
      collabs.listen = vi.fn(() => {
        throw new Error("EADDRINUSE")
      })
      const server = makeServer()

      await expect(server.start()).rejects.toThrow("EADDRINUSE")
      expect(server.getState()).toBe("idle")
    })
  })

  describe("stop", () => {
    it("runs stop hooks, clears readiness and unregisters signal handlers", async () => {
      const stopHook: LifecycleHook = { name: "stop:flush", fn: async () => void order.push("stop") }
      const server = makeServer({ stopHooks: [stopHook] }).setupProcessHandlers()
      const handle = await server.start()

      const first = handle.stop()
      const second = handle.stop()

      expect(first).toBe(second)
      expect(await first).toStrictEqual({ ok: true, failures: [], timedOut: false })
      expect(order).toContain("stop")
      expect(server.isReady()).toBe(false)
      expect(unregister).toHaveBeenCalledOnce()
    })
  })

  describe("setupProcessHandlers", () => {
    it("is idempotent", () => {
      const server = makeServer()

      expect(server.setupProcessHandlers().setupProcessHandlers()).toBe(server)
      expect(collabs.setupProcessHandlers).toHaveBeenCalledOnce()
    })

    it("stops the running server when a signal arrives", async () => {
      let stop: (() => Promise<StopResult>) | undefined
      collabs.setupProcessHandlers = vi.fn((ctx: SignalHandlerContext) => {
        stop = ctx.stop
        return { unregister }
      })
      const server = makeServer().setupProcessHandlers()

      expect(await stop?.()).toStrictEqual({ ok: true, failures: [], timedOut: false })
      expect(logger.warn).toHaveBeenCalledWith("Stop called but server not running")

      await server.start()
      await stop?.()

      expect(server.isReady()).toBe(false)
      expect(unregister).toHaveBeenCalledOnce()
    })
  })
})
