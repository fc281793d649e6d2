/**
 * Resolved filesystem path used as the unit of mutual exclusion.
 */
export type LockKey = string

export interface PathLock {
  /**
   * Runs `fn` once every earlier holder of `key` has finished. Calls on
   * different keys never wait on each other.
   */
  withLock<T>(key: LockKey, fn: () => Promise<T>): Promise<T>
}
