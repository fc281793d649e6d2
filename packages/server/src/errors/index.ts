export { createErrorHandler, type ErrorHandler } from "./create-error-handler"
export {
  createErrorFormatter,
  type ErrorContextTransformer,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  type ErrorResponseBody,
  type FallbackMapping,
} from "./errors"
export {
  isValidationError,
  parseOrThrow,
  ValidationError,
  type ValidationErrorContext,
  type ValidationIssue,
} from "./validation"
