import path from "node:path"
import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@bucketfs/config"
import { type AppConfig, type EnvConfig, envAliases, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig, cwd: string): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
      serviceName: env.SERVICE_NAME,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    requestId: {
      header: env.REQUEST_ID_HEADER,
    },
    requestLogging: {
      enabled: env.REQUEST_LOGGING_ENABLED,
      level: env.REQUEST_LOGGING_LEVEL,
    },
    storage: {
      rootDir: path.resolve(cwd, env.STORAGE_ROOT),
      pathLocking: env.STORE_PATH_LOCKING,
    },
    cors: {
      origins: parseList(env.CORS_ORIGINS),
    },
    auth: {
      accessKey: env.ACCESS_KEY,
      secretKey: env.SECRET_KEY,
    },
  }
}

function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
}

/**
 * `.env`, then `.env.<NODE_ENV>`, then the process environment. Later sources
 * win. A relative `STORAGE_ROOT` resolves against `cwd`.
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const sources: ConfigSource[] = [new DotenvSource({ file: ".env", required: false, cwd })]

  if (env.NODE_ENV) {
    sources.push(new DotenvSource({ file: `.env.${env.NODE_ENV}`, required: false, cwd }))
  }

  sources.push(new EnvSource({ env }))

  const result = await loadConfig({
    schema: envSchema,
    sources,
    aliases: envAliases,
  })

  return mapEnvToConfig(result.value, cwd)
}
