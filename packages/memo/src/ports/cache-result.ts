import type { CacheEntry, ResultValues } from "./cache-entry"

export type CacheHit<V extends ResultValues> = {
  kind: "hit"
  entry: CacheEntry<V>
}

export type CacheMiss = {
  kind: "miss"
}

export type CacheResult<V extends ResultValues> = CacheHit<V> | CacheMiss
