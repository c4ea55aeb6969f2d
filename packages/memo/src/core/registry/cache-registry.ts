import { MapStore } from "../../adapters/map/map-store"
import { NullLogger } from "../../adapters/null/null-logger"
import type { ClearableCache } from "../../ports/cache"
import type { CacheId, NamespaceFilter } from "../../ports/cache-id"
import type { CacheTtl } from "../../ports/cache-options"
import type { EntryStore } from "../../ports/entry-store"
import type { Logger } from "../../ports/logger"
import { MemoError } from "../errors/memo-error"
import { type Clock, SystemClock } from "../time/clock"

export type CacheRegistryDeps = {
  clock: Clock
  logger: Logger
}

export type CacheRegistryOptions = {
  /**
   * Timeout applied to caches created without one.
   * @default undefined (entries never expire)
   */
  defaultTimeout?: CacheTtl

  /**
   * Store written by shared map caches that do not bring their own.
   * @default a new in-memory store
   */
  sharedStore?: EntryStore
}

/**
 * Append-only collection of every cache created against it.
 *
 * @remarks
 * The registry also carries what caches are built with: the clock, the logger,
 * the default timeout and the shared store. Caches are kept in creation order
 * and are never removed.
 */
export class CacheRegistry {
  readonly clock: Clock
  readonly logger: Logger
  readonly defaultTimeout: CacheTtl | undefined
  readonly sharedStore: EntryStore

  private readonly caches = new Map<string, ClearableCache>()

  public constructor(deps: Partial<CacheRegistryDeps> = {}, opts: CacheRegistryOptions = {}) {
    this.clock = deps.clock ?? new SystemClock()
    this.logger = deps.logger ?? new NullLogger()
    this.defaultTimeout = opts.defaultTimeout
    this.sharedStore = opts.sharedStore ?? new MapStore()
  }

  register(cache: ClearableCache): void {
    const { qualifiedName } = cache.id

    if (this.caches.has(qualifiedName)) {
      throw new MemoError(`A cache named "${qualifiedName}" is already registered`, {
        code: "duplicate_cache",
        context: { cache: qualifiedName },
      })
    }

    this.caches.set(qualifiedName, cache)
    this.logger.debug("Cache registered", { cache: qualifiedName })
  }

  get(qualifiedName: string): ClearableCache | undefined {
    return this.caches.get(qualifiedName)
  }

  has(qualifiedName: string): boolean {
    return this.caches.has(qualifiedName)
  }

  /** Ids of every registered cache, in creation order. */
  list(): CacheId[] {
    return [...this.caches.values()].map((cache) => cache.id)
  }

  size(): number {
    return this.caches.size
  }

  /**
   * Invalidate every entry of every cache matching `filter` (all caches when
   * omitted), in creation order.
   *
   * @remarks
   * A cache whose clear fails does not stop the others. Each failure is logged
   * and the first one is rethrown once every matching cache has been visited.
   */
  async clearAll(filter?: NamespaceFilter): Promise<void> {
    const targets = [...this.caches.values()].filter(
      (cache) => filter === undefined || matchesNamespace(cache.id, filter),
    )
    const failures: unknown[] = []

    for (const cache of targets) {
      try {
        await cache.clear()
      } catch (err) {
        failures.push(err)
        this.logger.error("Cache clear failed", { cache: cache.id.qualifiedName, err })
      }
    }

    this.logger.info("Caches cleared", {
      count: targets.length - failures.length,
      ...(typeof filter === "string" && { namespace: filter }),
    })

    if (failures.length > 0) throw failures[0]
  }
}

export function matchesNamespace(id: CacheId, filter: NamespaceFilter): boolean {
  if (typeof filter === "function") return filter(id)
  if (id.namespace === undefined) return false

  return id.namespace === filter || id.namespace.startsWith(`${filter}.`)
}

export function createCacheRegistry(
  deps: Partial<CacheRegistryDeps> = {},
  opts: CacheRegistryOptions = {},
): CacheRegistry {
  return new CacheRegistry(deps, opts)
}
