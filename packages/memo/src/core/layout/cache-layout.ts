import { MapBackend } from "../../adapters/map/map-backend"
import { MapStore } from "../../adapters/map/map-store"
import { SingleSlotBackend } from "../../adapters/single-slot/single-slot-backend"
import type { ResultValues } from "../../ports/cache-entry"
import type { CacheId } from "../../ports/cache-id"
import type { EntryStoreSource } from "../../ports/cache-options"
import type { ClearScope } from "../../ports/clear-scope"
import type { Logger } from "../../ports/logger"
import type { StorageBackend } from "../../ports/storage-backend"
import type { StorageKind } from "../../ports/storage-kind"
import { argsKey, type KeyDeriver, ownerPrefix, SINGLE_SLOT_KEY, sharedArgsKey } from "../keys/derive-key"
import type { Clock } from "../time/clock"

/**
 * Everything about a cache that depends on its storage kind, fixed at creation.
 */
export type CacheLayout<A extends unknown[], V extends ResultValues> = {
  backend: StorageBackend<V>
  deriveKey: KeyDeriver<A>

  /** Scope removing every entry this cache owns, and nothing else. */
  ownedScope: ClearScope
}

export type CacheLayoutConfig = {
  id: CacheId
  storage: StorageKind
  shared: boolean

  /** Store for map caches; ignored by single-slot caches. */
  store: EntryStoreSource | undefined

  /** Store used by shared map caches that do not bring their own. */
  sharedStore: EntryStoreSource
}

export type CacheLayoutDeps = {
  clock: Clock
  logger: Logger
}

export function createCacheLayout<A extends unknown[], V extends ResultValues>(
  config: CacheLayoutConfig,
  deps: CacheLayoutDeps,
): CacheLayout<A, V> {
  if (config.storage === "single-slot") {
    return {
      backend: new SingleSlotBackend<V>({ clock: deps.clock }),
      deriveKey: () => SINGLE_SLOT_KEY,
      ownedScope: { kind: "all" },
    }
  }

  if (config.shared) {
    return {
      backend: new MapBackend<V>({ ...deps, store: config.store ?? config.sharedStore }),
      deriveKey: (args) => sharedArgsKey(config.id, args),
      ownedScope: { kind: "prefix", prefix: ownerPrefix(config.id) },
    }
  }

  return {
    backend: new MapBackend<V>({ ...deps, store: config.store ?? new MapStore() }),
    deriveKey: (args) => argsKey(args),
    ownedScope: { kind: "all" },
  }
}
