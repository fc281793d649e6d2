import type { LifecycleHook } from "@bucketfs/server"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  return [
    {
      name: "start:storage-root",
      fn: async () => {
        await context.services.objectStore.ensureRoot()

        context.services.logger.info("Storage root ready", {
          rootDir: context.services.objectStore.rootDir,
        })
      },
    },
  ]
}

export type CreateStartHooksFn = typeof createStartHooks
