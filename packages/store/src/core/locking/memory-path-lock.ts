import type { LockKey, PathLock } from "../../ports/path-lock"

const noop = () => {}

/**
 * In-process mutual exclusion keyed by resolved path. Each key holds the tail
 * of a promise chain; a key is forgotten once its chain drains.
 */
export class MemoryPathLock implements PathLock {
  private readonly tails = new Map<LockKey, Promise<void>>()

  async withLock<T>(key: LockKey, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve()
    const run = previous.then(() => fn())

    const tail = run.then(noop, noop).then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key)
    })
    this.tails.set(key, tail)

    return run
  }

  /** Number of keys with work queued or running. */
  get size(): number {
    return this.tails.size
  }
}

export class NoopPathLock implements PathLock {
  async withLock<T>(_key: LockKey, fn: () => Promise<T>): Promise<T> {
    return fn()
  }
}
