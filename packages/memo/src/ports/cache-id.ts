/**
 * Externally visible identity of a cache.
 *
 * @remarks
 * `qualifiedName` is `namespace/name`, or just `name` without a namespace. It
 * is unique within a registry and is the owner component of keys written to a
 * shared store.
 *
 * @example
 * ```ts
 * const id: CacheId = {
 *   name: "sumOf",
 *   namespace: "billing.reports",
 *   qualifiedName: "billing.reports/sumOf",
 * }
 * ```
 */
export type CacheId = {
  readonly name: string
  readonly namespace?: string | undefined
  readonly qualifiedName: string
}

/**
 * Selects caches for bulk invalidation.
 *
 * - a string matches caches whose namespace equals it, or is nested under it
 *   (`"billing"` matches `"billing"` and `"billing.reports"`, not `"billingx"`)
 * - a predicate receives each cache's id
 */
export type NamespaceFilter = string | ((id: CacheId) => boolean)
