import type { CacheKey } from "./cache-key"
import type { ResultValues } from "./cache-entry"
import type { CacheResult } from "./cache-result"
import type { ClearScope } from "./clear-scope"
import type { StorageKind } from "./storage-kind"
import type { Milliseconds } from "./time"

/**
 * StorageBackend holds the entries of one cache.
 *
 * @remarks
 * - Exactly two implementations exist: a single slot and a (possibly shared) map.
 *   The implementation is chosen when the cache is created and never changes.
 * - Backends may be reached by interleaved callers. Every operation must leave
 *   the store consistent on its own; no operation is atomic with another.
 * - Backends never decide staleness. Expiration is evaluated by the caller.
 */
export interface StorageBackend<V extends ResultValues> {
  readonly kind: StorageKind

  /**
   * Look up the entry for `key`.
   *
   * @remarks
   * - A single-slot backend ignores `key`.
   * - A backend whose store could not be materialized reports a miss.
   */
  get(key: CacheKey): Promise<CacheResult<V>>

  /**
   * Write a new entry stamped with the current clock time.
   *
   * @remarks
   * - Overwrites are allowed; the last write wins.
   * - The stored entry and its `values` are frozen; callers share them.
   * - A single-slot backend ignores `key`.
   *
   * @returns The entry's timestamp, or `undefined` if the write was skipped
   * because the store could not be materialized.
   */
  set(key: CacheKey, values: V): Promise<Milliseconds | undefined>

  /**
   * Remove the entries selected by `scope`.
   *
   * @remarks
   * - Clearing entries that do not exist is a no-op.
   * - A single-slot backend resets its slot whatever the scope.
   */
  clear(scope: ClearScope): Promise<void>
}
