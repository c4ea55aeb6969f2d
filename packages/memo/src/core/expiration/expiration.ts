import type { CacheTtl } from "../../ports/cache-options"
import type { Milliseconds } from "../../ports/time"

export function toMilliseconds(ttl: CacheTtl): Milliseconds {
  if (ttl.kind === "seconds") return ttl.seconds * 1000

  return ttl.milliseconds
}

/**
 * Decide whether an entry written at `timestamp` is stale at `nowMs`.
 *
 * - no timeout: never stale
 * - no entry (`timestamp` undefined): stale, forcing a computation
 * - otherwise stale once `nowMs` is strictly past `timestamp + timeoutMs`
 */
export function isExpired(
  timeoutMs: Milliseconds | undefined,
  timestamp: Milliseconds | undefined,
  nowMs: Milliseconds,
): boolean {
  if (timeoutMs === undefined) return false
  if (timestamp === undefined) return true

  return nowMs > timestamp + timeoutMs
}
