import { isAppError } from "@bucketfs/errors"
import { isStoreError, StoreError } from "../store-error"

function systemError(code: string): NodeJS.ErrnoException {
  return Object.assign(new Error(`${code}: simulated`), { code })
}

describe("StoreError", () => {
  const objectCtx = { operation: "getObject" as const, bucket: "docs", key: "a/report.pdf" }

  it("builds not-found errors with their context", () => {
    const err = StoreError.objectNotFound(objectCtx)

    expect(err).toBeInstanceOf(StoreError)
    expect(err.name).toBe("StoreError")
    expect(err.code).toBe("object_not_found")
    expect(err.message).toBe("Object 'a/report.pdf' not found in bucket 'docs'")
    expect(err.context).toEqual(objectCtx)
    expect(isAppError(err)).toBe(true)
  })

  it("describes conflicts on buckets", () => {
    const ctx = { operation: "deleteBucket" as const, bucket: "docs" }

    expect(StoreError.bucketNotFound(ctx).message).toBe("Bucket 'docs' not found")
    expect(StoreError.bucketAlreadyExists({ ...ctx, operation: "createBucket" }).code).toBe(
      "bucket_already_exists",
    )
    expect(StoreError.bucketNotEmpty(ctx).message).toBe(
      "Bucket 'docs' is not empty. Delete its objects first or use force",
    )
  })

  describe("from", () => {
    it("passes store errors through unchanged", () => {
      const original = StoreError.bucketNotFound({ operation: "listObjects", bucket: "x" })

      expect(StoreError.from(original, objectCtx)).toBe(original)
    })

    it.each(["EACCES", "EPERM"])("maps %s to permission_denied", (code) => {
      const cause = systemError(code)
      const err = StoreError.from(cause, objectCtx)

      expect(err.code).toBe("permission_denied")
      expect(err.cause).toBe(cause)
      expect(err.message).toBe("Permission denied during getObject on 'a/report.pdf' in bucket 'docs'")
    })

    it("maps other failures to io_failure", () => {
      const err = StoreError.from(systemError("EIO"), { operation: "listBuckets" })

      expect(err.code).toBe("io_failure")
      expect(err.message).toBe("Storage I/O failed during listBuckets")
      expect(err.isRetryable).toBe(false)
    })

    it("marks transient resource exhaustion as retryable", () => {
      expect(StoreError.from(systemError("EMFILE"), objectCtx).isRetryable).toBe(true)
    })

    it("wraps non-error values", () => {
      const err = StoreError.from("boom", { operation: "headBucket", bucket: "docs" })

      expect(err.code).toBe("io_failure")
      expect(err.message).toBe("Storage I/O failed during headBucket on bucket 'docs'")
      expect(err.cause).toBe("boom")
    })
  })

  it("isStoreError narrows only store errors", () => {
    expect(isStoreError(StoreError.bucketNotFound({ operation: "headBucket" }))).toBe(true)
    expect(isStoreError(new Error("x"))).toBe(false)
  })
})
