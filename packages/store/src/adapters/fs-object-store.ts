import type { Stats } from "node:fs"
import { createWriteStream } from "node:fs"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import { Readable } from "node:stream"
import { pipeline } from "node:stream/promises"
import type { Clock } from "@bucketfs/clock"
import { hasSystemErrorCode } from "@bucketfs/errors"
import type { Logger } from "@bucketfs/logger"
import { listKeys } from "../core/listing/list-keys"
import {
  DirectoryMarkers,
  directorySegments,
  isDirectoryMarkerKey,
  isSidecarEntry,
} from "../core/markers/directory-markers"
import { hasEntries, MetadataSidecar } from "../core/metadata/metadata-sidecar"
import { computeEtag, contentTypeFor } from "../core/objects/object-info"
import { ExistenceOracle, statOrNull } from "../core/paths/existence"
import {
  assertBucketName,
  assertKey,
  assertWithin,
  bucketPath,
  DIRECTORY_MARKER,
  objectPath,
} from "../core/paths/path-resolver"
import { StoreError, type StoreErrorContext } from "../errors/store-error"
import type { ObjectStorePort } from "../ports/object-store"
import type { PathLock } from "../ports/path-lock"
import type {
  BucketInfo,
  BucketName,
  Bytes,
  DeleteBucketOptions,
  DeleteBucketResult,
  DirectoryResult,
  ListedObject,
  ObjectHead,
  ObjectKey,
  ObjectMetadata,
  PutOptions,
  PutResult,
  StoreData,
  StoredObject,
} from "../ports/store-types"

export interface FsObjectStoreDeps {
  logger: Logger
  clock: Clock
  lock: PathLock
}

export interface FsObjectStoreOptions {
  rootDir: string
}

type BucketContext = StoreErrorContext & { bucket: BucketName }
type ObjectContext = BucketContext & { key: ObjectKey }

export class FileSystemObjectStore implements ObjectStorePort {
  readonly rootDir: string

  private readonly logger: Logger
  private readonly lock: PathLock
  private readonly oracle: ExistenceOracle
  private readonly sidecar: MetadataSidecar
  private readonly markers: DirectoryMarkers

  constructor(deps: FsObjectStoreDeps, options: FsObjectStoreOptions) {
    this.rootDir = path.resolve(options.rootDir)
    this.logger = deps.logger
    this.lock = deps.lock
    this.oracle = new ExistenceOracle(this.rootDir)
    this.sidecar = new MetadataSidecar(deps.logger)
    this.markers = new DirectoryMarkers({ clock: deps.clock })
  }

  /** Creates the storage root if it is missing. */
  async ensureRoot(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true })
  }

  async createBucket(name: BucketName): Promise<BucketInfo> {
    const ctx: BucketContext = { operation: "createBucket", bucket: name }

    return this.guard(ctx, async () => {
      assertBucketName(ctx)
      const dir = bucketPath(this.rootDir, name)

      return this.lock.withLock(dir, async () => {
        await this.ensureRoot()

        try {
          await fs.mkdir(dir)
        } catch (err) {
          if (hasSystemErrorCode(err, "EEXIST")) throw StoreError.bucketAlreadyExists(ctx)
          throw err
        }

        const stat = await fs.stat(dir)
        this.logger.debug("Bucket created", ctx)

        return { name, creationDate: creationDateOf(stat) }
      })
    })
  }

  async listBuckets(): Promise<BucketInfo[]> {
    const ctx: StoreErrorContext = { operation: "listBuckets" }

    return this.guard(ctx, async () => {
      if ((await statOrNull(this.rootDir)) === null) return []

      const entries = await fs.readdir(this.rootDir, { withFileTypes: true })

      const buckets: BucketInfo[] = []
      for (const entry of entries) {
        if (!entry.isDirectory()) continue

        const stat = await statOrNull(path.join(this.rootDir, entry.name))
        if (stat === null) continue

        buckets.push({ name: entry.name, creationDate: creationDateOf(stat) })
      }

      return buckets.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    })
  }

  async headBucket(name: BucketName): Promise<BucketInfo> {
    const ctx: BucketContext = { operation: "headBucket", bucket: name }

    return this.guard(ctx, async () => {
      assertBucketName(ctx)
      const stat = await this.requireBucket(ctx)

      return { name, creationDate: creationDateOf(stat) }
    })
  }

  async bucketExists(name: BucketName): Promise<boolean> {
    const ctx: BucketContext = { operation: "bucketExists", bucket: name }

    return this.guard(ctx, async () => {
      assertBucketName(ctx)
      return this.oracle.bucketExists(name)
    })
  }

  async deleteBucket(
    name: BucketName,
    options?: DeleteBucketOptions,
  ): Promise<DeleteBucketResult> {
    const ctx: BucketContext = { operation: "deleteBucket", bucket: name }
    const force = options?.force ?? false

    return this.guard(ctx, async () => {
      assertBucketName(ctx)
      const dir = bucketPath(this.rootDir, name)

      return this.lock.withLock(dir, async () => {
        await this.requireBucket(ctx)

        // Only the top level is inspected.
        const entries = await fs.readdir(dir)
        const hasObjects = entries.some((entry) => !isBookkeepingEntry(entry))

        if (hasObjects && !force) throw StoreError.bucketNotEmpty(ctx)

        if (force) {
          await this.removeAll(ctx, dir, entries)
        } else {
          await removeBookkeepingFiles(dir, entries)
        }

        try {
          await fs.rmdir(dir)
        } catch (err) {
          // A directory named like a sidecar or marker still holds objects.
          if (hasSystemErrorCode(err, "ENOTEMPTY", "EEXIST")) throw StoreError.bucketNotEmpty(ctx)
          throw err
        }
        this.logger.debug("Bucket deleted", { ...ctx, force })

        return { name, forceApplied: force }
      })
    })
  }

  async createDirectory(bucket: BucketName, directoryPath: string): Promise<DirectoryResult> {
    const ctx: ObjectContext = { operation: "createDirectory", bucket, key: directoryPath }

    return this.guard(ctx, async () => {
      assertBucketName(ctx)
      const dir = await this.resolveDirectory(ctx)

      const created = await this.lock.withLock(dir, () =>
        this.markers.createDirectoryPath(bucketPath(this.rootDir, bucket), directoryPath),
      )
      this.logger.debug("Directory created", { ...ctx, directory: created.directory })

      return { bucket, directory: created.directory, creationDate: created.createdAt }
    })
  }

  async putObject(
    bucket: BucketName,
    key: ObjectKey,
    data: StoreData,
    options?: PutOptions,
  ): Promise<PutResult> {
    const ctx: ObjectContext = { operation: "putObject", bucket, key }
    const contentType = options?.contentType

    return this.guard(ctx, async () => {
      assertBucketName(ctx)
      assertKey(ctx)

      if (isDirectoryMarkerKey(key)) {
        const dir = await this.resolveDirectory(ctx)
        discard(data)

        await this.lock.withLock(dir, () =>
          this.markers.materializeDirectory(bucketPath(this.rootDir, bucket), key),
        )
        this.logger.debug("Directory marker written", ctx)

        const result: PutResult = {
          kind: "directory",
          bucket,
          key,
          size: 0,
          ...(contentType && { contentType }),
          metadata: {},
        }
        return result
      }

      const file = await this.resolveObject(ctx)

      return this.lock.withLock(file, async () => {
        await fs.mkdir(path.dirname(file), { recursive: true })
        const size = await writeData(file, data)

        const requested = options?.metadata
        let metadata: ObjectMetadata = {}
        if (hasEntries(requested)) {
          const written = await this.sidecar.writeMetadata(file, requested)
          if (written) metadata = requested
        } else {
          await this.sidecar.deleteMetadata(file)
        }

        this.logger.debug("Object stored", { ...ctx, size })

        const result: PutResult = {
          kind: "object",
          bucket,
          key,
          size,
          ...(contentType && { contentType }),
          metadata,
        }
        return result
      })
    })
  }

  async objectExists(bucket: BucketName, key: ObjectKey): Promise<boolean> {
    const ctx: ObjectContext = { operation: "objectExists", bucket, key }

    return this.guard(ctx, async () => {
      assertBucketName(ctx)
      assertKey(ctx)
      assertWithin(bucketPath(this.rootDir, bucket), objectPath(this.rootDir, bucket, key), ctx)

      return this.oracle.objectExists(bucket, key)
    })
  }

  async listObjects(bucket: BucketName, prefix?: string): Promise<ListedObject[]> {
    const ctx: BucketContext = {
      operation: "listObjects",
      bucket,
      ...(prefix !== undefined && { prefix }),
    }

    return this.guard(ctx, async () => {
      assertBucketName(ctx)
      await this.requireBucket(ctx)

      return listKeys(bucketPath(this.rootDir, bucket), prefix ?? "")
    })
  }

  async headObject(bucket: BucketName, key: ObjectKey): Promise<ObjectHead> {
    const ctx: ObjectContext = { operation: "headObject", bucket, key }

    return this.guard(ctx, async () => {
      assertBucketName(ctx)
      assertKey(ctx)
      const file = await this.resolveObject(ctx)
      const stat = await this.requireObject(ctx, file)

      return this.describe(key, stat, await this.sidecar.readMetadata(file))
    })
  }

  async getObjectMetadata(bucket: BucketName, key: ObjectKey): Promise<ObjectMetadata> {
    const ctx: ObjectContext = { operation: "getObjectMetadata", bucket, key }

    return this.guard(ctx, async () => {
      assertBucketName(ctx)
      assertKey(ctx)
      const file = await this.resolveObject(ctx)
      await this.requireObject(ctx, file)

      return this.sidecar.readMetadata(file)
    })
  }

  async getObject(bucket: BucketName, key: ObjectKey): Promise<StoredObject> {
    const ctx: ObjectContext = { operation: "getObject", bucket, key }

    return this.guard(ctx, async () => {
      assertBucketName(ctx)
      assertKey(ctx)
      const file = await this.resolveObject(ctx)
      await this.requireObject(ctx, file)

      let handle: fs.FileHandle
      try {
        handle = await fs.open(file, "r")
      } catch (err) {
        if (hasSystemErrorCode(err, "ENOENT", "ENOTDIR")) throw StoreError.objectNotFound(ctx)
        throw err
      }

      try {
        const stat = await handle.stat()
        if (!stat.isFile()) throw StoreError.objectNotFound(ctx)

        const head = this.describe(key, stat, await this.sidecar.readMetadata(file))

        return { ...head, body: handle.createReadStream() }
      } catch (err) {
        await handle.close()
        throw err
      }
    })
  }

  async deleteObject(bucket: BucketName, key: ObjectKey): Promise<void> {
    const ctx: ObjectContext = { operation: "deleteObject", bucket, key }

    return this.guard(ctx, async () => {
      assertBucketName(ctx)
      assertKey(ctx)
      const file = await this.resolveObject(ctx)

      await this.lock.withLock(file, async () => {
        await this.requireObject(ctx, file)
        await this.sidecar.deleteMetadata(file)

        try {
          await fs.unlink(file)
        } catch (err) {
          if (hasSystemErrorCode(err, "ENOENT")) throw StoreError.objectNotFound(ctx)
          throw err
        }

        this.logger.debug("Object deleted", ctx)
      })
    })
  }

  private async guard<T>(ctx: StoreErrorContext, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      const error = StoreError.from(err, ctx)

      if (error.code === "io_failure" || error.code === "permission_denied") {
        this.logger.error("Store operation failed", { ...ctx, err: error })
      }

      throw error
    }
  }

  private async requireBucket(ctx: BucketContext): Promise<Stats> {
    const stat = await statOrNull(bucketPath(this.rootDir, ctx.bucket))
    if (stat === null || !stat.isDirectory()) throw StoreError.bucketNotFound(ctx)

    return stat
  }

  private async requireObject(ctx: ObjectContext, file: string): Promise<Stats> {
    const stat = await statOrNull(file)
    if (stat === null || !stat.isFile()) throw StoreError.objectNotFound(ctx)

    return stat
  }

  /** Checks the bucket, then returns the object's path inside it. */
  private async resolveObject(ctx: ObjectContext): Promise<string> {
    await this.requireBucket(ctx)

    const file = objectPath(this.rootDir, ctx.bucket, ctx.key)
    assertWithin(bucketPath(this.rootDir, ctx.bucket), file, ctx)

    return file
  }

  /** Checks the bucket, then returns the leaf directory `ctx.key` names. */
  private async resolveDirectory(ctx: ObjectContext): Promise<string> {
    await this.requireBucket(ctx)

    const bucketDir = bucketPath(this.rootDir, ctx.bucket)
    const segments = directorySegments(ctx.key)

    // "/" names the bucket directory itself.
    if (segments.length === 0) return bucketDir

    const dir = path.join(bucketDir, ...segments)
    assertWithin(bucketDir, dir, ctx)

    return dir
  }

  private async removeAll(ctx: BucketContext, dir: string, entries: string[]): Promise<void> {
    for (const entry of entries) {
      const target = path.join(dir, entry)

      try {
        await fs.rm(target, { recursive: true, force: true })
      } catch (err) {
        this.logger.warn("Failed to remove bucket entry", { ...ctx, path: target, err })
      }
    }
  }

  private describe(key: ObjectKey, stat: Stats, metadata: ObjectMetadata): ObjectHead {
    return {
      key,
      size: stat.size,
      lastModified: stat.mtime,
      contentType: contentTypeFor(key),
      metadata,
      etag: computeEtag(key, stat.size, stat.mtime),
    }
  }
}

function isBookkeepingEntry(name: string): boolean {
  return isSidecarEntry(name) || name.endsWith(DIRECTORY_MARKER)
}

/** Regular files only; directories are left for `rmdir` to refuse. */
async function removeBookkeepingFiles(dir: string, entries: string[]): Promise<void> {
  for (const entry of entries) {
    const target = path.join(dir, entry)
    const stat = await fs.lstat(target)

    if (stat.isFile()) await fs.unlink(target)
  }
}

/** Birth time where the filesystem records one, change time otherwise. */
function creationDateOf(stat: Stats): Date {
  return stat.birthtimeMs > 0 ? stat.birthtime : stat.ctime
}

async function writeData(file: string, data: StoreData): Promise<Bytes> {
  if (data instanceof Uint8Array) {
    await fs.writeFile(file, data)
    return data.byteLength
  }

  await pipeline(data, createWriteStream(file))
  const stat = await fs.stat(file)

  return stat.size
}

function discard(data: StoreData): void {
  if (data instanceof Readable) data.destroy()
}
