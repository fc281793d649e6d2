import { type Clock, SystemClock } from "@bucketfs/clock"
import { createNullLogger, type Logger } from "@bucketfs/logger"
import { MemoryPathLock, NoopPathLock } from "../core/locking/memory-path-lock"
import { FileSystemObjectStore } from "./fs-object-store"

export interface CreateFsObjectStoreOptions {
  rootDir: string
  logger?: Logger
  clock?: Clock
  /** Serialize mutations per resolved path. Defaults to `true`. */
  locking?: boolean
}

export function createFsObjectStore(options: CreateFsObjectStoreOptions): FileSystemObjectStore {
  return new FileSystemObjectStore(
    {
      logger: options.logger ?? createNullLogger(),
      clock: options.clock ?? new SystemClock(),
      lock: options.locking === false ? new NoopPathLock() : new MemoryPathLock(),
    },
    { rootDir: options.rootDir },
  )
}
