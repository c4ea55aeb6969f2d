import type { CacheKey } from "../../ports/cache-key"
import { type CanonicalArg, type CanonicalRecord, EMPTY_ARG } from "./canonicalize"

/**
 * Render a canonical argument tree as a cache key.
 *
 * Every leaf carries a type tag, so trees that differ in any leaf, in element
 * order, or only in a leaf's type (`1` vs `"1"`) never share a key.
 *
 * @example
 * ```ts
 * encodeKey(canonicalize([2, "a", null])) // '[n2,s"a",~]'
 * ```
 */
export function encodeKey(arg: CanonicalArg): CacheKey {
  if (arg === EMPTY_ARG) return "~"

  if (typeof arg === "string") return `s${JSON.stringify(arg)}`
  if (typeof arg === "number") return `n${String(arg)}`
  if (typeof arg === "boolean") return arg ? "T" : "F"
  if (typeof arg === "bigint") return `i${arg.toString()}`
  if (typeof arg === "symbol") return `y${JSON.stringify(Symbol.keyFor(arg) ?? "")}`

  if (arg instanceof Date) return `d${arg.getTime()}`

  if (isCanonicalList(arg)) return `[${arg.map((item) => encodeKey(item)).join(",")}]`

  return encodeRecord(arg)
}

function isCanonicalList(arg: CanonicalArg): arg is readonly CanonicalArg[] {
  return Array.isArray(arg)
}

function encodeRecord(record: CanonicalRecord): CacheKey {
  const fields = Object.entries(record)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, value]) => `${JSON.stringify(key)}:${encodeKey(value)}`)

  return `{${fields.join(",")}}`
}
