import type { Clock } from "../../core/time/clock"
import type { CacheEntry, ResultValues } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { EntryStoreSource } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { ClearScope } from "../../ports/clear-scope"
import type { EntryStore } from "../../ports/entry-store"
import type { Logger } from "../../ports/logger"
import type { StorageBackend } from "../../ports/storage-backend"
import type { Milliseconds } from "../../ports/time"

export type MapBackendDeps = {
  clock: Clock
  logger: Logger

  /**
   * The store to write to, or a provider resolved on first use.
   *
   * A provider that throws leaves the backend unmaterialized for good: lookups
   * miss and writes are skipped.
   */
  store: EntryStoreSource
}

type Materialization = { kind: "pending" } | { kind: "ready"; store: EntryStore } | { kind: "failed" }

export class MapBackend<V extends ResultValues> implements StorageBackend<V> {
  readonly kind = "map"

  private state: Materialization

  public constructor(private readonly deps: MapBackendDeps) {
    this.state =
      typeof deps.store === "function" ? { kind: "pending" } : { kind: "ready", store: deps.store }
  }

  async get(key: CacheKey): Promise<CacheResult<V>> {
    const store = this.materialize()
    if (store === undefined) return { kind: "miss" }

    const entry = store.get(key) as CacheEntry<V> | undefined
    if (entry === undefined) return { kind: "miss" }

    return { kind: "hit", entry }
  }

  async set(key: CacheKey, values: V): Promise<Milliseconds | undefined> {
    const store = this.materialize()
    if (store === undefined) return undefined

    const timestamp = this.deps.clock.nowMs()
    Object.freeze(values)
    store.set(key, Object.freeze({ values, timestamp }))

    return timestamp
  }

  async clear(scope: ClearScope): Promise<void> {
    const store = this.materialize()
    if (store === undefined) return

    if (scope.kind === "key") {
      store.delete(scope.key)
      return
    }

    if (scope.kind === "all") {
      store.clear()
      return
    }

    for (const key of store.keys()) {
      if (key.startsWith(scope.prefix)) {
        store.delete(key)
      }
    }
  }

  private materialize(): EntryStore | undefined {
    if (this.state.kind === "ready") return this.state.store
    if (this.state.kind === "failed") return undefined

    const source = this.deps.store
    if (typeof source !== "function") return undefined

    try {
      const store = source()
      this.state = { kind: "ready", store }

      return store
    } catch (err) {
      this.state = { kind: "failed" }
      this.deps.logger.error("Cache store could not be materialized; results will not be cached", {
        err,
      })

      return undefined
    }
  }
}
