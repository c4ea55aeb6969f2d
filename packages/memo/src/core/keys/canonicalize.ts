import { MemoError } from "../errors/memo-error"

/**
 * Canonical stand-in for absent values (`undefined`, `null`) and empty lists.
 */
export const EMPTY_ARG: unique symbol = Symbol("memo.empty")

export type EmptyArg = typeof EMPTY_ARG

export type CanonicalLeaf = string | number | boolean | bigint | symbol | Date

export interface CanonicalRecord {
  readonly [key: string]: CanonicalArg
}

export type CanonicalArg = EmptyArg | CanonicalLeaf | readonly CanonicalArg[] | CanonicalRecord

/**
 * Rewrite an argument value into a tree with structural equality.
 *
 * - absent values and empty lists become {@link EMPTY_ARG}
 * - lists are canonicalized element by element, order preserved; holes in
 *   sparse lists count as absent values
 * - plain objects are canonicalized entry by entry, keys sorted
 * - primitives, dates and registered symbols are kept as they are
 *
 * Values that only have identity (functions, unregistered symbols, class
 * instances, maps, sets) are rejected with an `unhashable_argument` error.
 *
 * @example
 * ```ts
 * canonicalize([1, [2, null], []]) // [1, [2, EMPTY_ARG], EMPTY_ARG]
 * ```
 */
export function canonicalize(value: unknown): CanonicalArg {
  if (value === undefined || value === null) return EMPTY_ARG

  if (Array.isArray(value)) {
    if (value.length === 0) return EMPTY_ARG

    return Array.from(value, (item: unknown) => canonicalize(item))
  }

  if (typeof value === "string" || typeof value === "boolean") return value
  if (typeof value === "bigint") return value
  if (typeof value === "number") return Object.is(value, -0) ? 0 : value

  if (typeof value === "symbol") {
    if (Symbol.keyFor(value) !== undefined) return value

    throw unhashable("unregistered symbol")
  }

  if (typeof value === "function") throw unhashable("function")

  if (value instanceof Date) return new Date(value.getTime())

  if (isPlainObject(value)) {
    const out: Record<string, CanonicalArg> = {}

    for (const key of Object.keys(value).sort()) {
      // plain assignment would treat "__proto__" as the prototype setter
      Object.defineProperty(out, key, {
        value: canonicalize(value[key]),
        enumerable: true,
        writable: true,
        configurable: true,
      })
    }

    return out
  }

  throw unhashable(describeInstance(value))
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false

  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}

function describeInstance(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    return `instance of ${value.constructor?.name ?? "unknown class"}`
  }

  return typeof value
}

function unhashable(valueType: string): MemoError<"unhashable_argument"> {
  return new MemoError(`Cannot derive a cache key from a ${valueType} argument`, {
    code: "unhashable_argument",
    context: { valueType },
  })
}
