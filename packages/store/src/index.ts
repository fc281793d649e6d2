export { type CreateFsObjectStoreOptions, createFsObjectStore } from "./adapters/create"
export {
  FileSystemObjectStore,
  type FsObjectStoreDeps,
  type FsObjectStoreOptions,
} from "./adapters/fs-object-store"
export { isPrefixRelated, listKeys } from "./core/listing/list-keys"
export { MemoryPathLock, NoopPathLock } from "./core/locking/memory-path-lock"
export {
  DirectoryMarkers,
  isDirectoryMarkerKey,
  isMarkerEntry,
  isSidecarEntry,
  markerContent,
} from "./core/markers/directory-markers"
export {
  INVALID_METADATA_MESSAGE,
  isJsonObject,
  MetadataSidecar,
  unwrapMetadataEnvelope,
} from "./core/metadata/metadata-sidecar"
export { computeEtag, contentTypeFor, DEFAULT_CONTENT_TYPE } from "./core/objects/object-info"
export { ExistenceOracle } from "./core/paths/existence"
export {
  bucketPath,
  DIRECTORY_MARKER,
  markerPath,
  objectPath,
  SIDECAR_SUFFIX,
  sidecarPath,
} from "./core/paths/path-resolver"
export {
  isStoreError,
  StoreError,
  type StoreErrorCode,
  type StoreErrorContext,
  type StoreOperation,
} from "./errors/store-error"
export type { ObjectStorePort } from "./ports/object-store"
export type { LockKey, PathLock } from "./ports/path-lock"
export type {
  BucketInfo,
  BucketName,
  Bytes,
  DeleteBucketOptions,
  DeleteBucketResult,
  DirectoryResult,
  JsonValue,
  ListedObject,
  ObjectHead,
  ObjectKey,
  ObjectMetadata,
  PutOptions,
  PutResult,
  StoreData,
  StoredObject,
} from "./ports/store-types"
