import {
  clear,
  clearAll,
  createCache,
  createCacheRegistry,
  createNullLogger,
  invoke,
  isMemoError,
  memoize,
} from "../index"
import { ManualTestClock } from "../tests/utils/manual-test-clock"

describe("public API", () => {
  it("memoizes, expires and invalidates through the package entry point", async () => {
    const clock = new ManualTestClock(new Date("2024-06-01T12:00:00.000Z"))
    const registry = createCacheRegistry({ clock, logger: createNullLogger() })

    let calls = 0
    const sumOf = createCache(registry, {
      name: "sumOf",
      namespace: "math",
      storage: "map",
      timeout: { kind: "seconds", seconds: 10 },
      compute: (a: number, b: number) => {
        calls++
        return [a + b] as const
      },
    })

    expect(await invoke(sumOf, [2, 3])).toStrictEqual([5])
    clock.advanceMs(10_000)
    expect(await invoke(sumOf, [2, 3])).toStrictEqual([5])
    expect(calls).toBe(1)

    clock.advanceMs(1)
    await invoke(sumOf, [2, 3])
    expect(calls).toBe(2)

    await clear(sumOf, [2, 3])
    await invoke(sumOf, [2, 3])
    expect(calls).toBe(3)

    await clearAll(registry, "math")
    await invoke(sumOf, [2, 3])
    expect(calls).toBe(4)
  })

  it("reports misconfiguration at creation time", () => {
    const registry = createCacheRegistry()
    memoize(registry, { name: "f" }, (n: number) => n)

    let caught: unknown
    try {
      memoize(registry, { name: "f" }, (n: number) => n)
    } catch (err) {
      caught = err
    }

    expect(isMemoError(caught, "duplicate_cache")).toBe(true)
  })
})
