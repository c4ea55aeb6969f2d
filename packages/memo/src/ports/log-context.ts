import type { StorageKind } from "./storage-kind"

export type LogContext = {
  /** Qualified name of the cache emitting the entry. */
  cache: string
  namespace: string
  storage: StorageKind
  shared: boolean

  key: string
  count: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta = Partial<LogContext> & Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext>
