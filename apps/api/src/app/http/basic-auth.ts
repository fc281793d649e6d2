import type { Middleware } from "@bucketfs/server"
import { basicAuth } from "hono/basic-auth"
import type { AppConfig } from "../config"

/**
 * Single credential pair. Failures answer 401 with a `WWW-Authenticate`
 * challenge so browsers prompt for a login.
 */
export function createBasicAuth(auth: AppConfig["auth"], realm: string): Middleware {
  return basicAuth({
    username: auth.accessKey,
    password: auth.secretKey,
    realm,
  })
}
