import * as path from "node:path"
import { StoreError, type StoreErrorContext } from "../../errors/store-error"
import type { BucketName, ObjectKey } from "../../ports/store-types"

export const SIDECAR_SUFFIX = ".metadata"
export const DIRECTORY_MARKER = ".directory"

/**
 * `<root>/<bucket>`. Joined verbatim; callers validate the name first.
 */
export function bucketPath(rootDir: string, bucket: BucketName): string {
  return path.join(rootDir, bucket)
}

/**
 * `<root>/<bucket>/<key>` with every `/` in the key kept as a directory
 * separator. Nothing is created on disk.
 */
export function objectPath(rootDir: string, bucket: BucketName, key: ObjectKey): string {
  return path.join(bucketPath(rootDir, bucket), key)
}

export function sidecarPath(objectFile: string): string {
  return `${objectFile}${SIDECAR_SUFFIX}`
}

export function markerPath(directory: string): string {
  return path.join(directory, DIRECTORY_MARKER)
}

export function assertBucketName(ctx: StoreErrorContext & { bucket: BucketName }): void {
  const name = ctx.bucket

  if (name.length === 0) throw StoreError.invalidBucketName(ctx, "name is empty")
  if (name === "." || name === "..") {
    throw StoreError.invalidBucketName(ctx, "name is reserved")
  }
  if (name.includes("/") || name.includes("\\")) {
    throw StoreError.invalidBucketName(ctx, "name must not contain path separators")
  }
  if (name.includes("\0")) {
    throw StoreError.invalidBucketName(ctx, "name must not contain NUL")
  }
}

export function assertKey(ctx: StoreErrorContext & { key: ObjectKey }): void {
  if (ctx.key.length === 0) throw StoreError.invalidKey(ctx, "key is empty")
  if (ctx.key.includes("\0")) throw StoreError.invalidKey(ctx, "key must not contain NUL")
}

/**
 * Throws unless `target` resolves strictly inside `parent`.
 */
export function assertWithin(
  parent: string,
  target: string,
  ctx: StoreErrorContext & { key: ObjectKey },
): void {
  const relative = path.relative(path.resolve(parent), path.resolve(target))

  if (
    relative === "" ||
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    throw StoreError.invalidKey(ctx, "key resolves outside its bucket")
  }
}
