import type { Cache } from "../ports/cache"
import type { CreateCacheOptions } from "../ports/cache-options"
import type { StorageKind } from "../ports/storage-kind"
import { createCache } from "./create-cache"
import type { CacheRegistry } from "./registry/cache-registry"

export type MemoizeOptions = Omit<CreateCacheOptions<unknown[], readonly unknown[]>, "compute" | "storage"> & {
  /** @default "map" */
  storage?: StorageKind
}

export type Memoized<A extends unknown[], R> = ((...args: A) => Promise<Awaited<R>>) & {
  readonly cache: Cache<A, readonly [Awaited<R>]>
  clear(args?: A): Promise<void>
}

/**
 * Wrap a single-result function in a cache.
 *
 * The result is stored as a one-element tuple and unwrapped on the way out.
 *
 * @example
 * ```ts
 * const loadUser = memoize(registry, { name: "loadUser" }, (id: string) => db.users.find(id))
 *
 * await loadUser("u-1")
 * await loadUser.clear(["u-1"])
 * ```
 */
export function memoize<A extends unknown[], R>(
  registry: CacheRegistry,
  options: MemoizeOptions,
  fn: (...args: A) => R,
): Memoized<A, R> {
  const cache = createCache<A, readonly [Awaited<R>]>(registry, {
    ...options,
    storage: options.storage ?? "map",
    compute: async (...args: A) => [await fn(...args)] as const,
  })

  const call = async (...args: A): Promise<Awaited<R>> => {
    const [value] = await cache.invoke(args)

    return value
  }

  return Object.assign(call, {
    cache,
    clear: (args?: A) => cache.clear(args),
  })
}
