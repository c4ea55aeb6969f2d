import type { Cache } from "../../ports/cache"
import type { ResultValues } from "../../ports/cache-entry"
import type { CacheId } from "../../ports/cache-id"
import type { CacheKey } from "../../ports/cache-key"
import type { ComputeFn } from "../../ports/cache-options"
import type { CacheStats } from "../../ports/cache-stats"
import type { Logger } from "../../ports/logger"
import type { StorageKind } from "../../ports/storage-kind"
import type { Milliseconds } from "../../ports/time"
import { isExpired } from "../expiration/expiration"
import { clearScopeFor } from "../invalidation/invalidate"
import type { CacheLayout } from "../layout/cache-layout"
import type { Clock } from "../time/clock"

export type MemoCacheConfig<A extends unknown[], V extends ResultValues> = {
  id: CacheId
  storage: StorageKind
  shared: boolean
  timeoutMs: Milliseconds | undefined
  compute: ComputeFn<A, V>
  layout: CacheLayout<A, V>
}

export type MemoCacheDeps = {
  clock: Clock
  logger: Logger
}

export class MemoCache<A extends unknown[], V extends ResultValues> implements Cache<A, V> {
  readonly id: CacheId
  readonly storage: StorageKind
  readonly shared: boolean
  readonly timeoutMs: Milliseconds | undefined

  private readonly counters: CacheStats = {
    hits: 0,
    misses: 0,
    expirations: 0,
    writes: 0,
    skippedWrites: 0,
  }

  public constructor(
    private readonly config: MemoCacheConfig<A, V>,
    private readonly deps: MemoCacheDeps,
  ) {
    this.id = config.id
    this.storage = config.storage
    this.shared = config.shared
    this.timeoutMs = config.timeoutMs
  }

  async invoke(args: A): Promise<V> {
    const key = this.config.layout.deriveKey(args)
    const res = await this.config.layout.backend.get(key)

    if (res.kind === "hit") {
      if (!isExpired(this.timeoutMs, res.entry.timestamp, this.deps.clock.nowMs())) {
        this.counters.hits++
        this.deps.logger.trace("Cache hit", { key })

        return res.entry.values
      }

      this.counters.expirations++
      this.deps.logger.debug("Cache entry expired", { key })
    } else {
      this.deps.logger.debug("Cache miss", { key })
    }

    this.counters.misses++

    return this.computeAndStore(key, args)
  }

  async clear(args?: A): Promise<void> {
    const scope = clearScopeFor(this.config.layout, args)

    await this.config.layout.backend.clear(scope)

    this.deps.logger.debug("Cache cleared", {
      ...(scope.kind === "key" && { key: scope.key }),
    })
  }

  stats(): CacheStats {
    return { ...this.counters }
  }

  private async computeAndStore(key: CacheKey, args: A): Promise<V> {
    const startedAt = this.deps.clock.nowMs()
    const values = await this.config.compute(...args)
    const durationMs = this.deps.clock.nowMs() - startedAt

    const timestamp = await this.config.layout.backend.set(key, values)

    if (timestamp === undefined) {
      this.counters.skippedWrites++
      this.deps.logger.warn("Cache write skipped; store unavailable", { key, durationMs })
    } else {
      this.counters.writes++
    }

    return values
  }
}
