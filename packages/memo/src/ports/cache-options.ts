import type { ResultValues } from "./cache-entry"
import type { EntryStore } from "./entry-store"
import type { StorageKind } from "./storage-kind"
import type { Milliseconds, Seconds } from "./time"

type SecondsTtl = { kind: "seconds"; seconds: Seconds }
type MillisecondsTtl = { kind: "milliseconds"; milliseconds: Milliseconds }

export type CacheTtl = SecondsTtl | MillisecondsTtl

/**
 * The function whose results are cached. Results are returned as a tuple so
 * that multi-value results are stored whole.
 */
export type ComputeFn<A extends unknown[], V extends ResultValues> = (
  ...args: A
) => V | Promise<V>

/**
 * Where a map cache keeps its entries: a store instance, or a provider called
 * on first use.
 */
export type EntryStoreSource = EntryStore | (() => EntryStore)

export type CreateCacheOptions<A extends unknown[], V extends ResultValues> = {
  /** Cache name. Must be non-empty and must not contain `/`. */
  name: string

  /** Dotted namespace used for bulk invalidation, e.g. `"billing.reports"`. */
  namespace?: string

  storage: StorageKind

  /**
   * Whether this map cache writes to a store shared with other caches.
   *
   * Keys are then prefixed with the cache's qualified name. Defaults to
   * `false`. Not allowed for single-slot caches.
   */
  shared?: boolean

  /**
   * How long an entry stays fresh.
   *
   * - omitted: the registry's default timeout (if any)
   * - `null`: entries never expire
   */
  timeout?: CacheTtl | null

  /**
   * Store for a map cache. Defaults to a private store, or to the registry's
   * shared store when `shared` is set.
   */
  store?: EntryStoreSource

  compute: ComputeFn<A, V>
}
