import type {
  BucketInfo,
  BucketName,
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
} from "./store-types"

/**
 * Buckets and objects over a flat, slash-delimited key namespace.
 *
 * Failures are `StoreError`s: `bucket_not_found`, `object_not_found`,
 * `bucket_already_exists`, `bucket_not_empty`, `invalid_bucket_name`,
 * `invalid_key`, `permission_denied` and `io_failure`. Metadata problems never
 * fail an operation.
 */
export interface ObjectStorePort {
  createBucket(name: BucketName): Promise<BucketInfo>

  /** Sorted by name. */
  listBuckets(): Promise<BucketInfo[]>

  headBucket(name: BucketName): Promise<BucketInfo>

  bucketExists(name: BucketName): Promise<boolean>

  deleteBucket(name: BucketName, options?: DeleteBucketOptions): Promise<DeleteBucketResult>

  /** Creates each missing segment of `directoryPath` and marks the leaf. */
  createDirectory(bucket: BucketName, directoryPath: string): Promise<DirectoryResult>

  /** Overwrites silently; keys ending in `/` create a directory marker. */
  putObject(
    bucket: BucketName,
    key: ObjectKey,
    data: StoreData,
    options?: PutOptions,
  ): Promise<PutResult>

  /** `true` only for a regular file; directories and markers are not objects. */
  objectExists(bucket: BucketName, key: ObjectKey): Promise<boolean>

  /** Every object whose key starts with `prefix`. Unordered. */
  listObjects(bucket: BucketName, prefix?: string): Promise<ListedObject[]>

  headObject(bucket: BucketName, key: ObjectKey): Promise<ObjectHead>

  getObjectMetadata(bucket: BucketName, key: ObjectKey): Promise<ObjectMetadata>

  /** The caller owns `body` and must consume or destroy it. */
  getObject(bucket: BucketName, key: ObjectKey): Promise<StoredObject>

  deleteObject(bucket: BucketName, key: ObjectKey): Promise<void>
}
