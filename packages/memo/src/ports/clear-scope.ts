import type { CacheKey, OwnerPrefix } from "./cache-key"

/** Remove the entry stored under a single key. */
export type KeyClearScope = { kind: "key"; key: CacheKey }

/** Remove every entry in the store. */
export type AllClearScope = { kind: "all" }

/** Remove every entry whose key starts with `prefix`. */
export type PrefixClearScope = { kind: "prefix"; prefix: OwnerPrefix }

export type ClearScope = KeyClearScope | AllClearScope | PrefixClearScope
