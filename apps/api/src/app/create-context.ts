import { type AppConfig, loadAppConfig } from "./config"
import { type CreateReadinessChecksFn, createReadinessChecks } from "./lifecycle/readiness"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type RegisterRoutesFn, registerRoutes } from "./routes/register-routes"
import { type AppServices, createDefaultServices, type ServiceOverrides } from "./services"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv

  /** Directory holding `.env` files and anchoring a relative storage root. */
  cwd?: string

  serviceOverrides?: ServiceOverrides
}

export type AppContext = {
  config: AppConfig
  services: AppServices
  registerRoutes: RegisterRoutesFn
  createStartHooks: CreateStartHooksFn
  createReadinessChecks: CreateReadinessChecksFn
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config = await loadAppConfig(options.env ?? process.env, options.cwd)
  const services = createDefaultServices(config, options.serviceOverrides)

  return {
    config,
    services,
    registerRoutes,
    createStartHooks,
    createReadinessChecks,
  }
}
