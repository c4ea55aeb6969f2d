import type { ResultValues } from "./cache-entry"
import type { CacheId } from "./cache-id"
import type { CacheStats } from "./cache-stats"
import type { StorageKind } from "./storage-kind"
import type { Milliseconds } from "./time"

/**
 * A cache that can be invalidated as a whole. This is all the registry needs
 * to know about the caches it holds.
 */
export interface ClearableCache {
  readonly id: CacheId

  /** Invalidate every entry owned by this cache. */
  clear(): Promise<void>
}

/**
 * Handle to a memoized function.
 *
 * @remarks
 * - Results are computed at most once per key while fresh, except when
 *   concurrent callers miss on the same key: each of them computes, and the
 *   write that lands last wins.
 * - A failing compute function leaves the store untouched.
 */
export interface Cache<A extends unknown[], V extends ResultValues> extends ClearableCache {
  readonly storage: StorageKind
  readonly shared: boolean

  /** Resolved timeout, or `undefined` when entries never expire. */
  readonly timeoutMs: Milliseconds | undefined

  /**
   * Return the cached results for `args`, computing and storing them on a
   * miss or when the stored entry has expired.
   */
  invoke(args: A): Promise<V>

  /**
   * Invalidate the entry for `args`, or every entry owned by this cache when
   * `args` is omitted. Single-slot caches always reset their slot.
   */
  clear(args?: A): Promise<void>

  stats(): CacheStats
}
