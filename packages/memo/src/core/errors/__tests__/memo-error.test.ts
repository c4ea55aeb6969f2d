import { isMemoError, MemoError } from "../memo-error"

describe("MemoError", () => {
  it("carries code, frozen context and cause", () => {
    const cause = new Error("root")
    const err = new MemoError("boom", {
      code: "duplicate_cache",
      context: { cache: "a" },
      cause,
    })

    expect(err).toBeInstanceOf(Error)
    expect(err.name).toBe("MemoError")
    expect(err.code).toBe("duplicate_cache")
    expect(err.context).toStrictEqual({ cache: "a" })
    expect(Object.isFrozen(err.context)).toBe(true)
    expect(err.cause).toBe(cause)
    expect(err.isOperational).toBe(true)
  })

  it("serializes to a JSON-safe shape", () => {
    const err = new MemoError("bad", { code: "invalid_config", isOperational: false })

    expect(err.toJSON()).toStrictEqual({
      name: "MemoError",
      code: "invalid_config",
      message: "bad",
      context: {},
      isOperational: false,
      timestamp: err.timestamp.toISOString(),
    })
  })
})

describe("isMemoError", () => {
  const err = new MemoError("bad", { code: "unhashable_argument" })

  it("matches any code when none is given", () => {
    expect(isMemoError(err)).toBe(true)
  })

  it("matches on code", () => {
    expect(isMemoError(err, "unhashable_argument")).toBe(true)
    expect(isMemoError(err, "duplicate_cache")).toBe(false)
  })

  it("rejects foreign errors", () => {
    expect(isMemoError(new Error("bad"))).toBe(false)
    expect(isMemoError("bad")).toBe(false)
  })
})
