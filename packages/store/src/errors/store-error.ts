import { BaseError, hasSystemErrorCode } from "@bucketfs/errors"

export type StoreErrorCode =
  | "bucket_not_found"
  | "object_not_found"
  | "bucket_already_exists"
  | "bucket_not_empty"
  | "invalid_bucket_name"
  | "invalid_key"
  | "permission_denied"
  | "io_failure"

export type StoreOperation =
  | "createBucket"
  | "listBuckets"
  | "headBucket"
  | "bucketExists"
  | "deleteBucket"
  | "createDirectory"
  | "putObject"
  | "objectExists"
  | "listObjects"
  | "headObject"
  | "getObjectMetadata"
  | "getObject"
  | "deleteObject"

export type StoreErrorContext = {
  operation: StoreOperation
  bucket?: string
  key?: string
  prefix?: string
}

export class StoreError extends BaseError<StoreErrorCode> {
  declare readonly context: Readonly<StoreErrorContext>

  static bucketNotFound(ctx: StoreErrorContext): StoreError {
    return new StoreError(`Bucket '${ctx.bucket}' not found`, {
      code: "bucket_not_found",
      context: ctx,
    })
  }

  static objectNotFound(ctx: StoreErrorContext): StoreError {
    return new StoreError(`Object '${ctx.key}' not found in bucket '${ctx.bucket}'`, {
      code: "object_not_found",
      context: ctx,
    })
  }

  static bucketAlreadyExists(ctx: StoreErrorContext): StoreError {
    return new StoreError(
      `Bucket '${ctx.bucket}' already exists. Choose a unique bucket name`,
      { code: "bucket_already_exists", context: ctx },
    )
  }

  static bucketNotEmpty(ctx: StoreErrorContext): StoreError {
    return new StoreError(
      `Bucket '${ctx.bucket}' is not empty. Delete its objects first or use force`,
      { code: "bucket_not_empty", context: ctx },
    )
  }

  static invalidBucketName(ctx: StoreErrorContext, reason: string): StoreError {
    return new StoreError(`Invalid bucket name '${ctx.bucket}': ${reason}`, {
      code: "invalid_bucket_name",
      context: ctx,
    })
  }

  static invalidKey(ctx: StoreErrorContext, reason: string): StoreError {
    return new StoreError(`Invalid key '${ctx.key}': ${reason}`, {
      code: "invalid_key",
      context: ctx,
    })
  }

  static permissionDenied(ctx: StoreErrorContext, cause: unknown): StoreError {
    return new StoreError(`Permission denied during ${ctx.operation}${describeTarget(ctx)}`, {
      code: "permission_denied",
      context: ctx,
      cause,
    })
  }

  static ioFailure(ctx: StoreErrorContext, cause: unknown): StoreError {
    return new StoreError(`Storage I/O failed during ${ctx.operation}${describeTarget(ctx)}`, {
      code: "io_failure",
      context: ctx,
      cause,
      isRetryable: hasSystemErrorCode(cause, "EBUSY", "EAGAIN", "EMFILE", "ENFILE"),
    })
  }

  /**
   * Store errors pass through; filesystem errors become `permission_denied`
   * or `io_failure`.
   */
  static from(err: unknown, ctx: StoreErrorContext): StoreError {
    if (err instanceof StoreError) return err

    if (hasSystemErrorCode(err, "EACCES", "EPERM")) {
      return StoreError.permissionDenied(ctx, err)
    }

    return StoreError.ioFailure(ctx, err)
  }
}

function describeTarget(ctx: StoreErrorContext): string {
  if (ctx.bucket === undefined) return ""
  if (ctx.key === undefined) return ` on bucket '${ctx.bucket}'`

  return ` on '${ctx.key}' in bucket '${ctx.bucket}'`
}

export function isStoreError(err: unknown): err is StoreError {
  return err instanceof StoreError
}
