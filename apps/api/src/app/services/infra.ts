import { createFsObjectStore, type FileSystemObjectStore } from "@bucketfs/store"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type InfraServices = {
  objectStore: FileSystemObjectStore
}

export function createInfraServices(config: AppConfig, core: CoreServices): InfraServices {
  const objectStore = createFsObjectStore({
    rootDir: config.storage.rootDir,
    logger: core.logger.child({ module: "store" }),
    clock: core.clock,
    locking: config.storage.pathLocking,
  })

  return { objectStore }
}
