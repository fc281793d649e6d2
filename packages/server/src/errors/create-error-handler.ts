import type { ErrorCode } from "@bucketfs/errors"
import type { Logger } from "@bucketfs/logger"
import type { Context, ErrorHandler as HonoErrorHandler } from "hono"
import { HTTPException } from "hono/http-exception"
import { routePath } from "hono/route"
import type { StatusCode } from "../http/status-codes"
import { isNonEmptyString } from "../middleware/utils/is-non-empty-string"
import type { ErrorHandling } from "../server/server-options"
import { createErrorFormatter, type ErrorMappingsConfig } from "./errors"

export type ErrorHandler = HonoErrorHandler

export function createErrorHandler(errorHandling: ErrorHandling, logger: Logger): ErrorHandler {
  return errorHandling.kind === "handler"
    ? errorHandling.errorHandler
    : buildErrorHandler(errorHandling.config, logger)
}

export type CreateErrorHandlerFn = typeof createErrorHandler

function buildErrorHandler(mappings: ErrorMappingsConfig, logger: Logger): ErrorHandler {
  const formatter = createErrorFormatter(mappings)

  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown"

    // Middleware such as basic auth answers by throwing a prepared response.
    if (err instanceof HTTPException) {
      const response = err.getResponse()

      logger.info("Request rejected", {
        ...describeRequest(c, requestId),
        status: response.status,
      })

      return response
    }

    const response = formatter(err, requestId)

    logError(logger, err, {
      ...describeRequest(c, requestId),
      status: response.error.status,
      code: response.error.code,
    })

    return c.json(response, { status: response.error.status })
  }
}

function describeRequest(c: Context, requestId: string) {
  const matched = routePath(c)
  const route = isNonEmptyString(matched) ? matched : c.req.path

  return {
    requestId,
    method: c.req.method,
    route,
    op: `${c.req.method} ${route}`,
  }
}

type ErrorLogMeta = ReturnType<typeof describeRequest> & {
  status: StatusCode
  code: ErrorCode
}

/**
 * 5xx log at `error` with the cause. Client errors log at `info`, with the
 * cause only at `debug`.
 */
function logError(logger: Logger, err: unknown, meta: ErrorLogMeta): void {
  if (meta.status >= 500) {
    logger.error("Request failed", { ...meta, err })
    return
  }

  logger.info("Request failed", meta)
  logger.debug("Request failed details", { ...meta, err })
}
