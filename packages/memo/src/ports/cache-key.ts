/**
 * CacheKey is a plain string derived from a call's argument tuple.
 *
 * @remarks
 * Keys are produced by the key derivation in `core/keys` and are never built
 * by hand at call sites. Backends treat them as opaque strings, with one
 * exception: keys written to a shared store start with the owning cache's
 * prefix (see {@link OwnerPrefix}) so ownership can be recovered by a prefix
 * scan.
 *
 * @example
 * ```ts
 * const key: CacheKey = '"reports/sumOf":[n2,n3]'
 * ```
 */
export type CacheKey = string

/**
 * A prefix identifying the cache that owns a key inside a shared store.
 *
 * @remarks
 * Owner prefixes are prefix-free: no owner's prefix is the beginning of
 * another owner's prefix, so "every key starting with P" is exactly the set of
 * entries owned by one cache.
 */
export type OwnerPrefix = string
