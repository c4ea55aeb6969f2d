import { z } from "zod"
import type { Cache } from "../ports/cache"
import type { ResultValues } from "../ports/cache-entry"
import type { CacheId } from "../ports/cache-id"
import type { CacheTtl, CreateCacheOptions } from "../ports/cache-options"
import { storageKinds } from "../ports/storage-kind"
import { MemoCache } from "./cache/memo-cache"
import { MemoError } from "./errors/memo-error"
import { toMilliseconds } from "./expiration/expiration"
import { createCacheLayout } from "./layout/cache-layout"
import type { CacheRegistry } from "./registry/cache-registry"

const ttlSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("seconds"), seconds: z.number().nonnegative() }),
  z.object({ kind: z.literal("milliseconds"), milliseconds: z.number().nonnegative() }),
])

const noSlash = (value: string) => !value.includes("/")

const createCacheOptionsSchema = z
  .object({
    name: z.string().min(1).refine(noSlash, { message: "must not contain '/'" }),
    namespace: z.string().min(1).refine(noSlash, { message: "must not contain '/'" }).optional(),
    storage: z.enum(storageKinds),
    shared: z.boolean().optional(),
    timeout: ttlSchema.nullable().optional(),
    store: z
      .custom((value) => typeof value === "function" || (typeof value === "object" && value !== null), {
        message: "must be a store or a store provider",
      })
      .optional(),
    compute: z.custom((value) => typeof value === "function", { message: "must be a function" }),
  })
  .refine((opts) => !(opts.storage === "single-slot" && opts.shared === true), {
    message: "single-slot caches cannot be shared",
    path: ["shared"],
  })

export function toCacheId(name: string, namespace?: string): CacheId {
  return {
    name,
    namespace,
    qualifiedName: namespace === undefined ? name : `${namespace}/${name}`,
  }
}

/**
 * Create a cache for `options.compute` and append it to `registry`.
 *
 * @remarks
 * Misconfiguration is reported here, never at call time:
 * - invalid options throw `invalid_cache_options`
 * - a qualified name already in the registry throws `duplicate_cache`
 *
 * @example
 * ```ts
 * const sumOf = createCache(registry, {
 *   name: "sumOf",
 *   storage: "map",
 *   compute: (a: number, b: number) => [a + b] as const,
 * })
 *
 * await sumOf.invoke([2, 3]) // [5]
 * ```
 */
export function createCache<A extends unknown[], V extends ResultValues>(
  registry: CacheRegistry,
  options: CreateCacheOptions<A, V>,
): Cache<A, V> {
  const parsed = createCacheOptionsSchema.safeParse(options)

  if (!parsed.success) {
    throw new MemoError(
      `Invalid options for cache "${String(options.name)}":\n${z.prettifyError(parsed.error)}`,
      { code: "invalid_cache_options", context: { name: options.name } },
    )
  }

  const id = toCacheId(options.name, options.namespace)
  const shared = options.shared ?? false
  const ttl: CacheTtl | undefined =
    options.timeout === undefined ? registry.defaultTimeout : (options.timeout ?? undefined)

  const logger = registry.logger.child({
    cache: id.qualifiedName,
    storage: options.storage,
    shared,
    ...(id.namespace !== undefined && { namespace: id.namespace }),
  })

  const layout = createCacheLayout<A, V>(
    {
      id,
      storage: options.storage,
      shared,
      store: options.store,
      sharedStore: registry.sharedStore,
    },
    { clock: registry.clock, logger },
  )

  const cache = new MemoCache<A, V>(
    {
      id,
      storage: options.storage,
      shared,
      timeoutMs: ttl === undefined ? undefined : toMilliseconds(ttl),
      compute: options.compute,
      layout,
    },
    { clock: registry.clock, logger },
  )

  registry.register(cache)

  return cache
}
