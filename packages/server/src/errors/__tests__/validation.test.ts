import { BaseError } from "@bucketfs/errors"
import { z } from "zod/mini"
import { $ZodError } from "zod/v4/core"
import { isValidationError, parseOrThrow, ValidationError } from "../validation"

const bucketRequest = z.object({
  name: z.string().check(z.minLength(1, { error: "Bucket name is required" })),
  tags: z.optional(z.array(z.string({ error: "Tags must be strings" }))),
})

function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }

  throw new Error("expected the call to throw")
}

describe("parseOrThrow", () => {
  it("returns the parsed value", () => {
    expect(parseOrThrow(bucketRequest, { name: "docs" })).toEqual({ name: "docs" })
  })

  it("throws a ValidationError carrying every issue", () => {
    const err = captureError(() => parseOrThrow(bucketRequest, { name: "" }))

    expect(err).toBeInstanceOf(ValidationError)
    expect(err).toMatchObject({
      code: "validation_error",
      message: "Bucket name is required",
      context: { issues: [{ path: "name", message: "Bucket name is required" }] },
    })
  })

  it("formats array indices as [n] in paths", () => {
    const err = captureError(() => parseOrThrow(bucketRequest, { name: "docs", tags: ["a", 1] }))

    expect(err).toMatchObject({
      context: { issues: [{ path: "tags[1]", message: "Tags must be strings" }] },
    })
  })
})

describe("ValidationError.fromZodError", () => {
  it('falls back to "Invalid input" when there are no issues', () => {
    const err = ValidationError.fromZodError(new $ZodError([]))

    expect(err.message).toBe("Invalid input")
    expect(err.context).toEqual({ issues: [] })
  })
})

describe("isValidationError", () => {
  it("recognises validation errors only", () => {
    const validation = captureError(() => parseOrThrow(bucketRequest, {}))

    expect(isValidationError(validation)).toBe(true)
    expect(isValidationError(new BaseError("nope", { code: "validation_error" }))).toBe(false)
    expect(isValidationError(new Error("nope"))).toBe(false)
  })
})
