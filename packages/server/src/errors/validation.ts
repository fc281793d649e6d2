import { BaseError, type ErrorContext } from "@bucketfs/errors"
import * as z from "zod/v4/core"

export type ValidationIssue = { path: string; message: string }

export type ValidationErrorContext = ErrorContext & {
  issues: ValidationIssue[]
}

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""

  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }

  return out
}

export class ValidationError extends BaseError<"validation_error"> {
  declare readonly context: Readonly<ValidationErrorContext>

  static fromZodError(err: z.$ZodError): ValidationError {
    const issues = err.issues.map((i) => ({
      path: formatPath(i.path),
      message: i.message,
    }))

    return new ValidationError(issues[0]?.message ?? "Invalid input", {
      code: "validation_error",
      context: { issues },
    })
  }
}

/**
 * Parses `data`, turning schema failures into a `ValidationError`.
 */
export function parseOrThrow<S extends z.$ZodType>(schema: S, data: unknown): z.output<S> {
  const result = z.safeParse(schema, data)

  if (!result.success) throw ValidationError.fromZodError(result.error)

  return result.data
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError
}
