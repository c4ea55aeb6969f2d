import { T0 } from "../../../tests/utils/memo-test-helpers"
import { ManualTestClock } from "../../../tests/utils/manual-test-clock"
import { RecordingLogger } from "../../../tests/utils/recording-logger"
import { MapBackend } from "../map-backend"
import { MapStore } from "../map-store"

type Values = readonly [number]

describe("MapBackend", () => {
  let clock: ManualTestClock
  let logger: RecordingLogger

  beforeEach(() => {
    clock = new ManualTestClock(T0)
    logger = new RecordingLogger()
  })

  describe("prefix clear", () => {
    it("removes only the keys starting with the prefix", async () => {
      const store = new MapStore()
      const backend = new MapBackend<Values>({ clock, logger, store })

      await backend.set('"a":[n1]', [1])
      await backend.set('"a":[n2]', [2])
      await backend.set('"ab":[n1]', [3])

      await backend.clear({ kind: "prefix", prefix: '"a":' })

      expect(store.keys()).toStrictEqual(['"ab":[n1]'])
    })

    it("does not disturb keys in the same store written by another backend", async () => {
      const store = new MapStore()
      const first = new MapBackend<Values>({ clock, logger, store })
      const second = new MapBackend<Values>({ clock, logger, store })

      await first.set("x:1", [1])
      await second.set("y:1", [2])

      await first.clear({ kind: "prefix", prefix: "x:" })

      expect(await second.get("y:1")).toStrictEqual({
        kind: "hit",
        entry: { values: [2], timestamp: T0.getTime() },
      })
    })
  })

  describe("store provider", () => {
    it("calls the provider once, on first use", async () => {
      const provider = vi.fn(() => new MapStore())
      const backend = new MapBackend<Values>({ clock, logger, store: provider })

      expect(provider).not.toHaveBeenCalled()

      await backend.set("k", [1])
      await backend.get("k")

      expect(provider).toHaveBeenCalledTimes(1)
    })

    it("stays unmaterialized when the provider throws", async () => {
      const provider = vi.fn((): MapStore => {
        throw new Error("no store")
      })
      const backend = new MapBackend<Values>({ clock, logger, store: provider })

      expect(await backend.set("k", [1])).toBeUndefined()
      expect(await backend.get("k")).toStrictEqual({ kind: "miss" })
      await expect(backend.clear({ kind: "all" })).resolves.toBeUndefined()

      expect(provider).toHaveBeenCalledTimes(1)
    })

    it("logs the materialization failure once", async () => {
      const failure = new Error("no store")
      const backend = new MapBackend<Values>({
        clock,
        logger,
        store: () => {
          throw failure
        },
      })

      await backend.get("k")
      await backend.set("k", [1])

      expect(logger.records).toStrictEqual([
        {
          level: "error",
          message: "Cache store could not be materialized; results will not be cached",
          fields: { err: failure },
        },
      ])
    })
  })

  it("reports its storage kind", () => {
    const backend = new MapBackend<Values>({ clock, logger, store: new MapStore() })

    expect(backend.kind).toBe("map")
  })
})
