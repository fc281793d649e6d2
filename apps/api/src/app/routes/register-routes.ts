import { type Application, createRouter } from "@bucketfs/server"
import { createBucketsModule } from "../../domains/buckets/api"
import { createObjectsModule } from "../../domains/objects/api"
import type { AppConfig } from "../config"
import { createBasicAuth } from "../http/basic-auth"
import { createCors } from "../http/cors"
import type { AppServices } from "../services"

export const SERVICE_VERSION = "1.0.0"

export type ApiModule = {
  name: string
  register: (app: Application) => void
}

export function registerRoutes(app: Application, config: AppConfig, services: AppServices): void {
  // Must precede basic auth: preflight requests carry no credentials.
  app.use("*", createCors(config.cors))

  app.get("/", (c) =>
    c.json({
      message: `Welcome to ${config.app.serviceName}, a filesystem-backed object store`,
      version: SERVICE_VERSION,
    }),
  )

  const buckets = createRouter()

  buckets.use("*", createBasicAuth(config.auth, config.app.serviceName))

  const modules: ApiModule[] = [
    createBucketsModule({ store: services.objectStore }),
    createObjectsModule({ store: services.objectStore }),
  ]

  for (const m of modules) {
    m.register(buckets)
  }

  app.route("/buckets", buckets)
}

export type RegisterRoutesFn = typeof registerRoutes
