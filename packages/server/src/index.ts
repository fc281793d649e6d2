export {
  createErrorFormatter,
  type ErrorContextTransformer,
  type ErrorHandler,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  type ErrorResponseBody,
  isValidationError,
  parseOrThrow,
  ValidationError,
  type ValidationIssue,
} from "./errors"
export type { StatusCode } from "./http/status-codes"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type {
  HookFailure,
  LifecycleHook,
  LifecycleHookContext,
  LifecycleHookFn,
} from "./lifecycle/lifecycle-hook"
export type { StopResult } from "./lifecycle/shutdown"
export {
  type Application,
  type Context,
  type CreateAppFn,
  createApp,
  createRouter,
  type Middleware,
  type RequestHandler,
  type Router,
} from "./server/application"
export { createServer, Server, ServerError, type ServerState } from "./server/server"
export type {
  ReadinessCheck,
  ResolvedServerOptions,
  ServerDependencies,
  ServerOptions,
} from "./server/server-options"
export type { ServerContextVariables } from "./types/context"
