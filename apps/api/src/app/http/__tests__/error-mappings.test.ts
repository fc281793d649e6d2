import { createErrorFormatter } from "@bucketfs/server"
import { StoreError } from "@bucketfs/store"
import { errorMappings } from "../error-mappings"

describe("errorMappings", () => {
  const format = createErrorFormatter(errorMappings)

  it.each([
    [StoreError.bucketNotFound({ operation: "headBucket", bucket: "b" }), 404],
    [StoreError.objectNotFound({ operation: "getObject", bucket: "b", key: "k" }), 404],
    [StoreError.bucketAlreadyExists({ operation: "createBucket", bucket: "b" }), 409],
    [StoreError.bucketNotEmpty({ operation: "deleteBucket", bucket: "b" }), 409],
    [StoreError.invalidBucketName({ operation: "createBucket", bucket: ".." }, "reserved"), 400],
    [StoreError.invalidKey({ operation: "putObject", bucket: "b", key: "" }, "empty"), 400],
    [StoreError.permissionDenied({ operation: "putObject", bucket: "b" }, new Error("EACCES")), 500],
    [StoreError.ioFailure({ operation: "putObject", bucket: "b" }, new Error("EIO")), 500],
  ])("maps %s", (error, status) => {
    expect(format(error, "req-1").error.status).toBe(status)
  })

  it("copies the store context into the body", () => {
    const error = StoreError.objectNotFound({ operation: "getObject", bucket: "media", key: "a.txt" })

    expect(format(error, "req-1")).toEqual({
      error: {
        code: "object_not_found",
        status: 404,
        message: "Object 'a.txt' not found in bucket 'media'",
        requestId: "req-1",
        operation: "getObject",
        bucket: "media",
        key: "a.txt",
      },
    })
  })

  it("hides filesystem detail behind a generic message", () => {
    const error = StoreError.ioFailure(
      { operation: "deleteObject", bucket: "media", key: "a.txt" },
      new Error("EIO: i/o error, unlink '/srv/storage/media/a.txt'"),
    )

    expect(format(error, "req-1").error.message).toBe("Storage operation failed")
  })

  it("falls back to 500 for unknown errors", () => {
    expect(format(new Error("boom"), "req-1").error).toEqual({
      code: "internal_error",
      status: 500,
      message: "An unexpected error occurred",
      requestId: "req-1",
    })
  })
})
