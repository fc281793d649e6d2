import type { Context } from "hono"
import type { Middleware } from "../server/application"
import type { EnabledRequestIdConfig } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"

function resolveRequestId(c: Context, config: Required<EnabledRequestIdConfig>): string {
  const existing = c.get("requestId")
  if (isNonEmptyString(existing)) return existing

  const fromHeader = c.req.header(config.header)
  if (isNonEmptyString(fromHeader)) return fromHeader

  return config.generate()
}

/**
 * Takes the request id from the configured header or generates one, stores
 * it on the context and echoes it on the response.
 */
export function requestIdMiddleware(config: Required<EnabledRequestIdConfig>): Middleware {
  return async (c, next) => {
    const requestId = resolveRequestId(c, config)

    c.set("requestId", requestId)

    await next()

    // A handler that set the header itself keeps its value.
    if (!c.res.headers.has(config.header)) c.res.headers.set(config.header, requestId)
  }
}
