import type { AppConfig } from "../config"
import { type CoreServices, createCoreServices } from "./core"
import { createInfraServices, type InfraServices } from "./infra"

export type AppServices = CoreServices & InfraServices

export type ServiceOverrides = Partial<AppServices>

/**
 * Overrides replace whole services. A replaced logger or clock is also what
 * the default store receives.
 */
export function createDefaultServices(
  config: AppConfig,
  overrides: ServiceOverrides = {},
): AppServices {
  const base = createCoreServices(config)

  const core: CoreServices = {
    logger: overrides.logger ?? base.logger,
    clock: overrides.clock ?? base.clock,
  }

  const infra: InfraServices = overrides.objectStore
    ? { objectStore: overrides.objectStore }
    : createInfraServices(config, core)

  return { ...core, ...infra }
}

export type { CoreServices, InfraServices }
