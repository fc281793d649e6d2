import type { Stats } from "node:fs"
import * as fs from "node:fs/promises"
import { hasSystemErrorCode } from "@bucketfs/errors"
import type { BucketName, ObjectKey } from "../../ports/store-types"
import { bucketPath, objectPath } from "./path-resolver"

/**
 * `lstat`, or `null` when the path or one of its parents is missing. A
 * symbolic link reports as a link, so it is neither a bucket nor an object.
 */
export async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.lstat(target)
  } catch (err) {
    if (hasSystemErrorCode(err, "ENOENT", "ENOTDIR")) return null
    throw err
  }
}

/**
 * Answers existence questions straight from the filesystem; nothing is
 * cached between calls.
 */
export class ExistenceOracle {
  constructor(private readonly rootDir: string) {}

  async bucketExists(bucket: BucketName): Promise<boolean> {
    const stat = await statOrNull(bucketPath(this.rootDir, bucket))

    return stat?.isDirectory() ?? false
  }

  async objectExists(bucket: BucketName, key: ObjectKey): Promise<boolean> {
    const stat = await statOrNull(objectPath(this.rootDir, bucket, key))

    return stat?.isFile() ?? false
  }
}
