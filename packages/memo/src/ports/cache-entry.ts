import type { Milliseconds } from "./time"

/**
 * The complete, ordered sequence of values produced by one invocation of a
 * cached function.
 *
 * Functions with several results return them as a tuple; the whole tuple is
 * stored, never a single element of it.
 */
export type ResultValues = readonly unknown[]

/**
 * A stored result together with the time of the write that produced it.
 */
export type CacheEntry<V extends ResultValues = ResultValues> = {
  readonly values: V

  /** Clock time (ms since epoch) of the write. Hits never refresh it. */
  readonly timestamp: Milliseconds
}
