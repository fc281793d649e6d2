import type { Milliseconds } from "@bucketfs/clock"
import { type LogLevelName, logLevelNames } from "@bucketfs/logger"
import { z } from "zod/mini"

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "bucketfs"),
  SERVER_HOST: z._default(z.string(), "0.0.0.0"),

  SERVER_PORT: z._default(z.coerce.number(), 8001),
  SERVER_SHUTDOWN_TIMEOUT_MS: z._default(z.coerce.number(), 10_000),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(z.stringbool(), false),

  REQUEST_ID_HEADER: z._default(z.string(), "x-request-id"),

  REQUEST_LOGGING_ENABLED: z._default(z.stringbool(), true),
  REQUEST_LOGGING_LEVEL: z._default(z.enum(logLevelNames), "info"),

  STORAGE_ROOT: z._default(z.string().check(z.minLength(1)), "./storage"),
  STORE_PATH_LOCKING: z._default(z.stringbool(), true),

  CORS_ORIGINS: z._default(z.string(), "*"),

  ACCESS_KEY: z._default(z.string().check(z.minLength(1)), "admin"),
  SECRET_KEY: z._default(z.string().check(z.minLength(1)), "password"),
})

/**
 * Older deployments name the storage root and credentials differently.
 */
export const envAliases = {
  STORAGE_ROOT: ["BASE_DIR"],
  ACCESS_KEY: ["OPENS3_ACCESS_KEY", "S3_USERNAME"],
  SECRET_KEY: ["OPENS3_SECRET_KEY", "S3_PASSWORD"],
} as const satisfies Record<string, readonly string[]>

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
    serviceName: string
  }

  server: {
    host: string
    port: number
    shutdownTimeoutMs: Milliseconds
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }

  requestId: {
    header: string
  }

  requestLogging: {
    enabled: boolean
    level: LogLevelName
  }

  storage: {
    /** Absolute. */
    rootDir: string
    pathLocking: boolean
  }

  cors: {
    /** `["*"]` allows any origin. */
    origins: string[]
  }

  auth: {
    accessKey: string
    secretKey: string
  }
}
