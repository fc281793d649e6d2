import fs from "node:fs/promises"
import type { ReadinessCheck } from "@bucketfs/server"
import type { AppContext } from "../create-context"

export function createReadinessChecks(context: AppContext): ReadinessCheck[] {
  return [
    {
      name: "storage",
      fn: async () => {
        const stats = await fs.stat(context.services.objectStore.rootDir)

        return stats.isDirectory()
      },
    },
  ]
}

export type CreateReadinessChecksFn = typeof createReadinessChecks
