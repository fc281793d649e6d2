import {
  type Application,
  createServer,
  type LifecycleHook,
  type Server,
} from "@bucketfs/server"
import type { AppContext } from "../app/create-context"
import { errorMappings } from "../app/http/error-mappings"

export type BuiltServer = {
  app: Application
  server: Server
  startHooks: LifecycleHook[]
}

export function buildServer(ctx: AppContext): BuiltServer {
  const startHooks = ctx.createStartHooks(ctx)

  const server = createServer(
    {
      clock: ctx.services.clock,
      logger: ctx.services.logger,
    },
    {
      host: ctx.config.server.host,
      port: ctx.config.server.port,
      shutdownTimeoutMs: ctx.config.server.shutdownTimeoutMs,

      errorHandling: { kind: "mappings", config: errorMappings },

      requestId: {
        enabled: true,
        header: ctx.config.requestId.header,
      },

      requestLogging: ctx.config.requestLogging.enabled
        ? { enabled: true, level: ctx.config.requestLogging.level }
        : { enabled: false },

      health: {
        enabled: true,
        readinessChecks: ctx.createReadinessChecks(ctx),
      },

      routes: (app: Application): void => {
        ctx.registerRoutes(app, ctx.config, ctx.services)
      },

      startHooks,
    },
  )

  return {
    app: server.app,
    server,
    startHooks,
  }
}
