import type { Cache } from "../ports/cache"
import type { ResultValues } from "../ports/cache-entry"
import type { NamespaceFilter } from "../ports/cache-id"
import type { CacheRegistry } from "./registry/cache-registry"

/** Per-call entry point. See {@link Cache.invoke}. */
export function invoke<A extends unknown[], V extends ResultValues>(
  cache: Cache<A, V>,
  args: A,
): Promise<V> {
  return cache.invoke(args)
}

/** Invalidate one entry, or every entry the cache owns. See {@link Cache.clear}. */
export function clear<A extends unknown[], V extends ResultValues>(
  cache: Cache<A, V>,
  args?: A,
): Promise<void> {
  return cache.clear(args)
}

/** Registry-wide invalidation. See {@link CacheRegistry.clearAll}. */
export function clearAll(registry: CacheRegistry, filter?: NamespaceFilter): Promise<void> {
  return registry.clearAll(filter)
}
