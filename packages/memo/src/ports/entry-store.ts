import type { CacheEntry } from "./cache-entry"
import type { CacheKey } from "./cache-key"

/**
 * EntryStore is the key/entry map behind map caches.
 *
 * @remarks
 * One store may back several caches at once (a shared store). Each operation
 * runs to completion without yielding, so interleaved callers never observe a
 * half-applied write. Sequences of operations are not atomic.
 *
 * Entries are stored untyped; the owning cache restores the value type when
 * reading its own keys.
 */
export interface EntryStore {
  get(key: CacheKey): CacheEntry | undefined

  set(key: CacheKey, entry: CacheEntry): void

  /**
   * Remove the given key.
   *
   * Returns true if the key was present.
   */
  delete(key: CacheKey): boolean

  clear(): void

  /**
   * Snapshot of the current keys, in insertion order.
   *
   * The snapshot is detached from the store, so callers may delete while
   * iterating it.
   */
  keys(): CacheKey[]

  size(): number
}
