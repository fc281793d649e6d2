import { BaseError } from "../../base-error"
import { toAppError } from "../to-app-error"

describe("toAppError", () => {
  it("passes app errors through", () => {
    const err = new BaseError("taken", { code: "bucket_already_exists" })

    expect(toAppError(err)).toBe(err)
  })

  it("wraps plain errors as non-operational", () => {
    const cause = new TypeError("bad")
    const result = toAppError(cause, "internal_error")

    expect(result).toBeInstanceOf(BaseError)
    expect(result.code).toBe("internal_error")
    expect(result.message).toBe("bad")
    expect(result.cause).toBe(cause)
    expect(result.isOperational).toBe(false)
  })

  it("wraps thrown strings and values", () => {
    expect(toAppError("boom").message).toBe("boom")
    expect(toAppError("boom").code).toBe("unknown")
    expect(toAppError(7).context).toEqual({ value: 7 })
  })
})
