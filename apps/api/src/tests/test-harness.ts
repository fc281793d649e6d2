import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { NullLogger } from "@bucketfs/logger"
import type { Application, LifecycleHookContext } from "@bucketfs/server"
import {
  type AppContext,
  type AppContextOptions,
  createAppContext,
} from "../app/create-context"
import { buildServer } from "../server"

export const TEST_CREDENTIALS = {
  accessKey: "test-user",
  secretKey: "test-secret",
} as const

export type TestHarness = {
  /** Fully built Hono app, ready for app.request() */
  app: Application

  ctx: AppContext

  /** Temporary storage root, removed by `cleanup` */
  rootDir: string

  /** Runs the start hooks without opening a socket */
  start: () => Promise<void>

  cleanup: () => Promise<void>

  /** `Authorization` header for the configured credentials */
  authHeader: () => Record<string, string>
}

export async function createTestHarness(
  options: Omit<AppContextOptions, "cwd"> = {},
): Promise<TestHarness> {
  const rootDir = await fs.mkdtemp(path.join(os.tmpdir(), "bucketfs-api-"))

  const ctx = await createAppContext({
    cwd: rootDir,
    env: {
      STORAGE_ROOT: path.join(rootDir, "storage"),
      ACCESS_KEY: TEST_CREDENTIALS.accessKey,
      SECRET_KEY: TEST_CREDENTIALS.secretKey,
      ...options.env,
    },
    serviceOverrides: { logger: new NullLogger(), ...options.serviceOverrides },
  })

  const { server, startHooks } = buildServer(ctx)

  server.build()

  return {
    app: server.app,
    ctx,
    rootDir,
    start: async () => {
      const hookCtx: LifecycleHookContext = {
        signal: new AbortController().signal,
        timeRemainingMs: 30_000,
      }

      for (const hook of startHooks) {
        await hook.fn(hookCtx)
      }
    },
    cleanup: () => fs.rm(rootDir, { recursive: true, force: true }),
    authHeader: () => basicAuthHeader(TEST_CREDENTIALS.accessKey, TEST_CREDENTIALS.secretKey),
  }
}

export function basicAuthHeader(username: string, password: string): Record<string, string> {
  const token = Buffer.from(`${username}:${password}`).toString("base64")

  return { Authorization: `Basic ${token}` }
}
