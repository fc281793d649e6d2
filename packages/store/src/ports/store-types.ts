import type { Readable } from "node:stream"

export type BucketName = string

/**
 * Slash-delimited object identifier. Each `/` becomes a directory level on
 * disk; a trailing `/` names a directory marker rather than an object.
 */
export type ObjectKey = string

export type Bytes = number

export type StoreData = Readable | Buffer | Uint8Array

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

/**
 * User metadata kept in an object's sidecar. Reads that cannot decode the
 * sidecar return `{ error: "..." }` instead of failing.
 */
export type ObjectMetadata = { [key: string]: JsonValue }

export interface BucketInfo {
  name: BucketName
  creationDate: Date
}

export interface ListedObject {
  key: ObjectKey
  size: Bytes
  lastModified: Date
}

export interface ObjectHead extends ListedObject {
  /** Guessed from the key's extension. */
  contentType: string
  metadata: ObjectMetadata
  etag: string
}

export interface StoredObject extends ObjectHead {
  body: Readable
}

export interface PutOptions {
  /** Echoed back in the result; never persisted. */
  contentType?: string

  /**
   * Persisted to the sidecar. Omitting it (or passing `{}`) removes any
   * sidecar left by a previous upload of the same key.
   */
  metadata?: ObjectMetadata
}

export interface PutResult {
  /** `"directory"` for keys ending in `/`: a marker was written, no data file. */
  kind: "object" | "directory"
  bucket: BucketName
  key: ObjectKey
  size: Bytes
  contentType?: string
  metadata: ObjectMetadata
}

export interface DeleteBucketOptions {
  /** Remove contents first instead of failing on a non-empty bucket. */
  force?: boolean
}

export interface DeleteBucketResult {
  name: BucketName
  forceApplied: boolean
}

export interface DirectoryResult {
  bucket: BucketName
  /** Normalized, always ending in `/`. */
  directory: string
  creationDate: Date
}
