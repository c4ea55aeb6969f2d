import type { CacheId } from "../../ports/cache-id"
import type { CacheKey, OwnerPrefix } from "../../ports/cache-key"
import { canonicalize } from "./canonicalize"
import { encodeKey } from "./encode-key"

/**
 * Key used by single-slot caches, which never derive one from arguments.
 */
export const SINGLE_SLOT_KEY: CacheKey = ""

export type KeyDeriver<A extends unknown[]> = (args: A) => CacheKey

/**
 * Prefix marking the keys a cache owns inside a shared store.
 *
 * JSON string literals are prefix-free (the closing quote is the only unescaped
 * quote), so one owner's prefix never starts another owner's.
 */
export function ownerPrefix(id: CacheId): OwnerPrefix {
  return `${JSON.stringify(id.qualifiedName)}:`
}

export function argsKey(args: readonly unknown[]): CacheKey {
  return encodeKey(canonicalize(args))
}

export function sharedArgsKey(id: CacheId, args: readonly unknown[]): CacheKey {
  return `${ownerPrefix(id)}${argsKey(args)}`
}
