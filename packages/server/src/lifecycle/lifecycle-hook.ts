import type { Milliseconds } from "@bucketfs/clock"

/** Handed to every start and stop hook. */
export interface LifecycleHookContext {
  /** Aborted once the phase deadline passes. */
  signal: AbortSignal
  /** Budget left in the current phase when the hook starts. */
  timeRemainingMs: Milliseconds
}

export type LifecycleHookFn = (ctx: LifecycleHookContext) => Promise<void>

/**
 * A named step run while the server starts or stops, e.g. `start:storage`
 * creating the storage root. Hooks run one after another in list order.
 */
export interface LifecycleHook {
  name: string
  fn: LifecycleHookFn
}

/** A hook that threw, keyed by its name for the startup and shutdown logs. */
export interface HookFailure {
  hook: LifecycleHook["name"]
  error: unknown
}
