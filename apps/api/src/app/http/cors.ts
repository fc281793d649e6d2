import type { Middleware } from "@bucketfs/server"
import { cors } from "hono/cors"
import type { AppConfig } from "../config"

/**
 * Requested headers are echoed back in preflight answers. Object headers are
 * exposed so browser clients can read them.
 */
export function createCors(config: AppConfig["cors"]): Middleware {
  const origin = config.origins.includes("*") ? "*" : config.origins

  return cors({
    origin,
    allowMethods: ["GET", "HEAD", "PUT", "POST", "DELETE"],
    exposeHeaders: ["Content-Disposition", "Content-Length", "ETag", "Last-Modified"],
  })
}
