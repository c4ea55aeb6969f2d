export type CacheStats = {
  hits: number

  /** Lookups that ran the compute function, expired entries included. */
  misses: number

  /** Misses caused by an entry older than the timeout. */
  expirations: number

  writes: number

  /** Writes dropped because the store could not be materialized. */
  skippedWrites: number
}
