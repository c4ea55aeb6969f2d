import type { Clock } from "../../core/time/clock"
import type { CacheEntry, ResultValues } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheResult } from "../../ports/cache-result"
import type { ClearScope } from "../../ports/clear-scope"
import type { StorageBackend } from "../../ports/storage-backend"
import type { Milliseconds } from "../../ports/time"

export type SingleSlotBackendDeps = {
  clock: Clock
}

export class SingleSlotBackend<V extends ResultValues> implements StorageBackend<V> {
  readonly kind = "single-slot"

  private slot: CacheEntry<V> | undefined

  public constructor(private readonly deps: SingleSlotBackendDeps) {}

  async get(_key: CacheKey): Promise<CacheResult<V>> {
    if (this.slot === undefined) return { kind: "miss" }

    return { kind: "hit", entry: this.slot }
  }

  async set(_key: CacheKey, values: V): Promise<Milliseconds> {
    const timestamp = this.deps.clock.nowMs()
    Object.freeze(values)
    this.slot = Object.freeze({ values, timestamp })

    return timestamp
  }

  async clear(_scope: ClearScope): Promise<void> {
    this.slot = undefined
  }
}
