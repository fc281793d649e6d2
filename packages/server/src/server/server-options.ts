import { randomUUID } from "node:crypto"
import type { Clock, Milliseconds } from "@bucketfs/clock"
import type { Logger, LogLevelName } from "@bucketfs/logger"
import type { ErrorHandler } from "../errors/create-error-handler"
import type { ErrorMappingsConfig } from "../errors/errors"
import type { LifecycleHook } from "../lifecycle/lifecycle-hook"
import { type Application, createApp, type Middleware } from "./application"

export type PathString = `/${string}`

export interface DisabledConfig {
  enabled: false
}

export interface ServerDependencies {
  logger: Logger
  clock: Clock
}

export interface EnabledRequestIdConfig {
  enabled: true

  /**
   * Read from the request when present, always echoed on the response.
   * @default "x-request-id"
   */
  header?: string

  /** @default crypto.randomUUID */
  generate?: () => string
}

export interface EnabledRequestLoggingConfig {
  enabled: true

  /**
   * Level of the per-request line. 5xx responses always log at `error`.
   * @default "info"
   */
  level?: LogLevelName

  /**
   * @default the health paths when health routes are enabled
   */
  ignorePaths?: PathString[]
}

/**
 * Runs on every readiness probe once the server is up. Resolving `false`
 * (or throwing, or running out of time) reports the server as not ready.
 */
export interface ReadinessCheck {
  name: string
  timeoutMs?: Milliseconds
  fn: (signal: AbortSignal) => Promise<boolean>
}

export interface EnabledHealthConfig {
  enabled: true

  /** @default "/health" */
  livenessPath?: PathString

  /** @default "/ready" */
  readinessPath?: PathString

  readinessChecks?: ReadinessCheck[]

  /** @default 5_000 */
  checkTimeoutMs?: Milliseconds
}

export type ErrorHandling =
  | { kind: "handler"; errorHandler: ErrorHandler }
  | { kind: "mappings"; config: ErrorMappingsConfig }

export type RequestIdConfig = DisabledConfig | EnabledRequestIdConfig
export type RequestLoggingConfig = DisabledConfig | EnabledRequestLoggingConfig
export type HealthConfig = DisabledConfig | EnabledHealthConfig

export interface ServerOptions {
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /**
   * Budget for all start hooks together.
   * @default the largest timer delay, i.e. no limit
   */
  startupTimeoutMs?: Milliseconds

  /**
   * Budget for closing the listener and running every stop hook.
   * @default 10_000
   */
  shutdownTimeoutMs?: Milliseconds

  requestId?: RequestIdConfig
  requestLogging?: RequestLoggingConfig
  health?: HealthConfig

  errorHandling: ErrorHandling

  createApp?: () => Application

  routes: (app: Application) => void

  /**
   * `pre` runs after the built-in middleware and before the routes are
   * registered; `post` is registered after them.
   */
  middleware?: {
    pre?: Middleware[]
    post?: Middleware[]
  }

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedRequestIdConfig = DisabledConfig | Required<EnabledRequestIdConfig>

export type ResolvedRequestLoggingConfig =
  | DisabledConfig
  | Required<EnabledRequestLoggingConfig>

export type ResolvedHealthConfig = DisabledConfig | Required<EnabledHealthConfig>

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: ResolvedRequestIdConfig
  requestLogging: ResolvedRequestLoggingConfig
  health: ResolvedHealthConfig
  errorHandling: ErrorHandling

  createApp: () => Application
  routes: (app: Application) => void
  middleware: { pre: Middleware[]; post: Middleware[] }
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

const MAX_TIMER_MS: Milliseconds = 2_147_483_647

export const DEFAULTS = {
  host: "0.0.0.0",
  startupTimeoutMs: MAX_TIMER_MS,
  shutdownTimeoutMs: 10_000,
  requestId: {
    enabled: true,
    header: "x-request-id",
    generate: () => randomUUID(),
  },
  requestLoggingLevel: "info",
  health: {
    enabled: true,
    livenessPath: "/health",
    readinessPath: "/ready",
    readinessChecks: [],
    checkTimeoutMs: 5_000,
  },
} satisfies {
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: Required<EnabledRequestIdConfig>
  requestLoggingLevel: LogLevelName
  health: Required<EnabledHealthConfig>
}

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health = resolveHealth(options.health)

  return {
    port: options.port,
    host: options.host ?? DEFAULTS.host,
    startupTimeoutMs: options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
    requestId: resolveRequestId(options.requestId),
    requestLogging: resolveRequestLogging(options.requestLogging, health),
    health,
    errorHandling: options.errorHandling,
    routes: options.routes,
    createApp: options.createApp ?? createApp,
    middleware: {
      pre: options.middleware?.pre ?? [],
      post: options.middleware?.post ?? [],
    },
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}

function resolveHealth(config: HealthConfig | undefined): ResolvedHealthConfig {
  if (config?.enabled === false) return { enabled: false }

  return { ...DEFAULTS.health, ...config, enabled: true }
}

function resolveRequestId(config: RequestIdConfig | undefined): ResolvedRequestIdConfig {
  if (config?.enabled === false) return { enabled: false }

  return { ...DEFAULTS.requestId, ...config, enabled: true }
}

function resolveRequestLogging(
  config: RequestLoggingConfig | undefined,
  health: ResolvedHealthConfig,
): ResolvedRequestLoggingConfig {
  if (config?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    level: config?.level ?? DEFAULTS.requestLoggingLevel,
    ignorePaths:
      config?.ignorePaths ??
      (health.enabled ? [health.livenessPath, health.readinessPath] : []),
  }
}
