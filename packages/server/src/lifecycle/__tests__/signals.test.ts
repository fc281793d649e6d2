import type { Logger } from "@bucketfs/logger"
import { mock } from "vitest-mock-extended"
import type { Mock } from "../../tests/mock"
import type { StopResult } from "../shutdown"
import { type SignalHandlerContext, type SignalTarget, setupProcessHandlers } from "../signals"

class FakeProcess implements SignalTarget {
  readonly listeners = new Map<string, Set<(...args: unknown[]) => void>>()
  readonly exits: number[] = []

  on(event: string, listener: (...args: unknown[]) => void): this {
    const set = this.listeners.get(event) ?? new Set()
    set.add(listener)
    this.listeners.set(event, set)
    return this
  }

  off(event: string, listener: (...args: unknown[]) => void): this {
    this.listeners.get(event)?.delete(listener)
    return this
  }

  exit(code: number): void {
    this.exits.push(code)
  }

  emit(event: string, ...args: unknown[]): void {
    for (const listener of this.listeners.get(event) ?? []) listener(...args)
  }

  count(event: string): number {
    return this.listeners.get(event)?.size ?? 0
  }
}

const CLEAN_STOP: StopResult = { ok: true, failures: [], timedOut: false }

describe("setupProcessHandlers", () => {
  let logger: Mock<Logger>
  let target: FakeProcess

  beforeEach(() => {
    logger = mock<Logger>()
    target = new FakeProcess()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  function setup(overrides: Partial<SignalHandlerContext> = {}) {
    return setupProcessHandlers({ logger, target, ...overrides })
  }

  describe("registration", () => {
    it("listens for signals and fatal events", () => {
      setup()

      for (const event of ["SIGINT", "SIGTERM", "uncaughtException", "unhandledRejection"]) {
        expect(target.count(event)).toBe(1)
      }
    })

    it("unregister removes every listener", () => {
      setup().unregister()

      for (const event of ["SIGINT", "SIGTERM", "uncaughtException", "unhandledRejection"]) {
        expect(target.count(event)).toBe(0)
      }
    })
  })

  describe("graceful signals", () => {
    it.each(["SIGINT", "SIGTERM"])("stops once on %s without exiting", async (signal) => {
      const stop = vi.fn(async () => CLEAN_STOP)
      setup({ stop })

      target.emit(signal)
      target.emit(signal)
      await vi.waitFor(() => expect(stop).toHaveBeenCalledOnce())

      expect(logger.warn).toHaveBeenCalledWith("Shutdown triggered", { reason: signal })
      expect(target.exits).toEqual([])
    })

    it("warns when there is nothing to stop", async () => {
      setup()

      target.emit("SIGTERM")

      await vi.waitFor(() =>
        expect(logger.warn).toHaveBeenCalledWith("No stop handler registered", {
          reason: "SIGTERM",
        }),
      )
    })

    it("reports a stop that finished with issues", async () => {
      const stop = vi.fn(async () => ({
        ok: false,
        failures: [{ hook: "stop:flush", error: new Error("nope") }],
        timedOut: true,
      }))
      setup({ stop })

      target.emit("SIGINT")

      await vi.waitFor(() =>
        expect(logger.error).toHaveBeenCalledWith("Shutdown completed with issues", {
          reason: "SIGINT",
          failureCount: 1,
          timedOut: true,
        }),
      )
    })

    it("reports a stop that threw", async () => {
      const err = new Error("stop exploded")
      setup({ stop: vi.fn(async () => Promise.reject(err)) })

      target.emit("SIGINT")

      await vi.waitFor(() =>
        expect(logger.error).toHaveBeenCalledWith("Shutdown failed", { reason: "SIGINT", err }),
      )
    })
  })

  describe("fatal events", () => {
    it.each(["uncaughtException", "unhandledRejection"])(
      "stops and exits with 1 on %s",
      async (event) => {
        const err = new Error("boom")
        const stop = vi.fn(async () => CLEAN_STOP)
        setup({ stop })

        target.emit(event, err)

        await vi.waitFor(() => expect(target.exits).toEqual([1]))
        expect(stop).toHaveBeenCalledOnce()
        expect(logger.fatal).toHaveBeenCalledWith("Fatal error", { reason: event, err })
      },
    )

    it("exits at once when a fatal event arrives during shutdown", () => {
      setup({ stop: () => new Promise<StopResult>(() => {}) })

      target.emit("SIGINT")
      target.emit("uncaughtException", new Error("late"))

      expect(target.exits).toEqual([1])
    })

    it("forces the exit when the stop outlives the fatal timeout", async () => {
      vi.useFakeTimers()
      setup({ stop: () => new Promise<StopResult>(() => {}), fatalTimeoutMs: 500 })

      target.emit("uncaughtException", new Error("boom"))
      await vi.advanceTimersByTimeAsync(499)
      expect(target.exits).toEqual([])

      await vi.advanceTimersByTimeAsync(1)
      expect(target.exits).toEqual([1])
      expect(logger.fatal).toHaveBeenCalledWith("Forced exit after timeout", { timeoutMs: 500 })
    })
  })
})
