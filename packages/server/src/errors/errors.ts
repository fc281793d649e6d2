import { type AppError, type ErrorCode, isAppError } from "@bucketfs/errors"
import type { StatusCode } from "../http/status-codes"

export type ErrorMapping = {
  status: StatusCode

  /**
   * Replaces the error's own message in the response. Omit it when the
   * error message is written for clients already.
   */
  message?: string
}

export type FallbackMapping = {
  code: ErrorCode
  status: StatusCode
  message: string
}

/**
 * Extra fields for the response body, taken from the error's context.
 * Returning `undefined` adds nothing.
 */
export type ErrorContextTransformer = (
  error: AppError,
) => Record<string, unknown> | undefined

export interface ErrorMappingsConfig {
  /**
   * Error code → status (and optional message). Unmapped `AppError`s keep
   * their code but take the fallback status and message.
   */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>

  /** Used for unmapped codes and for anything that is not an `AppError`. */
  fallback?: FallbackMapping

  transformContext?: ErrorContextTransformer
}

export type ErrorResponseBody = {
  status: StatusCode
  code: ErrorCode
  message: string
  requestId: string
  [key: string]: unknown
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

export function createErrorFormatter(config: ErrorMappingsConfig): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error, requestId) => {
    if (!isAppError(error)) {
      return {
        error: {
          code: fallback.code,
          status: fallback.status,
          message: fallback.message,
          requestId,
        },
      }
    }

    const mapping = config.mappings[error.code]
    const extra = extractExtraContext(config, error)

    return {
      error: {
        ...extra,
        code: error.code,
        status: mapping?.status ?? fallback.status,
        message: mapping ? (mapping.message ?? error.message) : fallback.message,
        requestId,
      },
    }
  }
}

function extractExtraContext(
  config: ErrorMappingsConfig,
  error: AppError,
): Record<string, unknown> {
  try {
    return config.transformContext?.(error) ?? {}
  } catch {
    // transformer failures only drop the extra fields
    return {}
  }
}
