import { BaseError } from "@bucketfs/errors"
import { type CreateErrorHandlerFn, createErrorHandler } from "../errors/create-error-handler"
import { type BuildAppFn, buildApp } from "../lifecycle/build-app"
import { type CreateStopperFn, createStopper, type ServerHandle } from "../lifecycle/create-stopper"
import { type ListenFn, listen } from "../lifecycle/listen"
import { type ShutdownFn, shutdown, type StopResult } from "../lifecycle/shutdown"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../lifecycle/signals"
import { type StartupFn, startup } from "../lifecycle/startup"
import {
  type CreateDefaultMiddlewareFn,
  createDefaultMiddleware,
} from "../middleware/create-default-middleware"
import type { Application } from "./application"
import {
  type ResolvedServerOptions,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"

export type ServerState = "idle" | "starting" | "started"

export interface ServerCollaborators {
  onStartup: StartupFn
  onShutdown: ShutdownFn
  listen: ListenFn
  buildApp: BuildAppFn
  createStopper: CreateStopperFn
  setupProcessHandlers: SetupProcessHandlersFn
  createDefaultMiddleware: CreateDefaultMiddlewareFn
  createErrorHandler: CreateErrorHandlerFn
}

const defaultCollaborators: ServerCollaborators = {
  onStartup: startup,
  onShutdown: shutdown,
  listen,
  buildApp,
  createStopper,
  setupProcessHandlers,
  createDefaultMiddleware,
  createErrorHandler,
}

export class ServerError extends BaseError<"server_already_started" | "startup_failed"> {
  static alreadyStarted(): ServerError {
    return new ServerError("Server already started", {
      code: "server_already_started",
      isOperational: false,
    })
  }

  static startupFailed(failedHooks: string[], timedOut: boolean): ServerError {
    const reason = timedOut ? "startup timed out" : `failed hooks: ${failedHooks.join(", ")}`

    return new ServerError(`Server startup failed (${reason})`, {
      code: "startup_failed",
      context: { failedHooks, timedOut },
    })
  }
}

export class Server {
  readonly app: Application

  private state: ServerState = "idle"
  private built = false
  private ready = false
  private runningServer?: ServerHandle
  private signalHandler?: SignalHandler

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
    private readonly collabs: ServerCollaborators = defaultCollaborators,
  ) {
    this.app = options.createApp()
  }

  /**
   * Registers health routes, middleware, routes and the error handler on
   * `app`. Idempotent; `start()` calls it too. Tests call it alone to drive
   * `app.request()` without a listener.
   */
  build(): this {
    if (this.built) return this

    this.collabs.buildApp({
      app: this.app,
      options: this.options,
      isReady: () => this.ready,
      errorHandler: this.collabs.createErrorHandler(this.options.errorHandling, this.deps.logger),
      defaultMiddleware: this.collabs.createDefaultMiddleware(this.options, this.deps.logger),
    })

    this.built = true

    return this
  }

  setupProcessHandlers(): this {
    if (this.signalHandler) return this

    this.signalHandler = this.collabs.setupProcessHandlers({
      logger: this.deps.logger,
      stop: () => this.runningServer?.stop() ?? this.noopStop(),
    })

    return this
  }

  async start(): Promise<ServerHandle> {
    if (this.state !== "idle") throw ServerError.alreadyStarted()

    this.state = "starting"

    try {
      const started = await this.collabs.onStartup({
        clock: this.deps.clock,
        logger: this.deps.logger,
        deadlineMs: this.deps.clock.nowMs() + this.options.startupTimeoutMs,
        startHooks: this.options.startHooks,
      })

      if (!started.ok) {
        throw ServerError.startupFailed(
          started.failures.map((f) => f.hook),
          started.timedOut,
        )
      }

      this.build()

      const server = this.collabs.listen(this.app, this.options, this.deps.logger)

      const handle = this.collabs.createStopper({
        server,
        deps: this.deps,
        options: this.options,
        stopHooks: this.options.stopHooks,
        shutdown: this.collabs.onShutdown,
        setReady: (value) => {
          this.ready = value
        },
        onStop: () => this.signalHandler?.unregister(),
      })

      this.runningServer = handle
      this.ready = true
      this.state = "started"

      return handle
    } catch (err) {
      this.state = "idle"
      this.ready = false

      throw err
    }
  }

  getState(): ServerState {
    return this.state
  }

  isBuilt(): boolean {
    return this.built
  }

  isReady(): boolean {
    return this.ready
  }

  private noopStop(): Promise<StopResult> {
    this.deps.logger.warn("Stop called but server not running")

    return Promise.resolve({ ok: true, failures: [], timedOut: false })
  }
}

export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  return new Server(deps, resolveOptions(options))
}
