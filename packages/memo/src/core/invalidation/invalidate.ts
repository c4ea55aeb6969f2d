import type { ResultValues } from "../../ports/cache-entry"
import type { ClearScope } from "../../ports/clear-scope"
import type { CacheLayout } from "../layout/cache-layout"

/**
 * Pick what a clear removes.
 *
 * - with `args`: the single entry derived from them (single-slot caches reset
 *   their slot whatever the key)
 * - without `args`: every entry the cache owns, which for a shared store means
 *   only the keys under the cache's owner prefix
 */
export function clearScopeFor<A extends unknown[]>(
  layout: Pick<CacheLayout<A, ResultValues>, "deriveKey" | "ownedScope">,
  args?: A,
): ClearScope {
  if (args === undefined) return layout.ownedScope

  return { kind: "key", key: layout.deriveKey(args) }
}
