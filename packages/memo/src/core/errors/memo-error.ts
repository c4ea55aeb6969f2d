export type MemoErrorCode =
  | "invalid_cache_options"
  | "duplicate_cache"
  | "unhashable_argument"
  | "invalid_config"

/**
 * Contextual metadata attached to errors.
 * Use this to carry structured data (cache names, offending values) without string munging.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export type MemoErrorOptions<C extends MemoErrorCode = MemoErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown

  /**
   * `true` for expected failures caused by input or configuration, `false` for
   * invariant violations.
   * @default true
   */
  isOperational?: boolean
}>

/**
 * Serialized error shape for logging. Designed to be JSON.stringify-safe.
 */
export type SerializedMemoError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
}>

export class MemoError<C extends MemoErrorCode = MemoErrorCode> extends Error {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: MemoErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedMemoError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: { ...this.context },
      isOperational: this.isOperational,
      timestamp: this.timestamp.toISOString(),
    }
  }
}

/**
 * Type guard for errors raised by the engine.
 *
 * @example
 * ```ts
 * try {
 *   createCache(registry, options)
 * } catch (err) {
 *   if (isMemoError(err, "duplicate_cache")) {
 *     // already registered
 *   }
 * }
 * ```
 */
export function isMemoError<C extends MemoErrorCode>(
  err: unknown,
  code?: C,
): err is MemoError<C> {
  if (!(err instanceof MemoError)) return false

  return code === undefined || err.code === code
}
