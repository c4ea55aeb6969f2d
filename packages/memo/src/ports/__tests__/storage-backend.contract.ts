import { beforeEach, describe, expect, it } from "vitest"
import { T0 } from "../../tests/utils/memo-test-helpers"
import { ManualTestClock } from "../../tests/utils/manual-test-clock"
import type { StorageBackend } from "../storage-backend"

type Values = readonly [number, string]

type CreateBackend = (clock: ManualTestClock) => StorageBackend<Values>

export function describeStorageBackendContract(adapterName: string, createBackend: CreateBackend): void {
  describe(`StorageBackend Contract Tests - ${adapterName}`, () => {
    let clock: ManualTestClock
    let backend: StorageBackend<Values>

    beforeEach(() => {
      clock = new ManualTestClock(T0)
      backend = createBackend(clock)
    })

    describe("get/set basic semantics", () => {
      it("returns miss before anything is written", async () => {
        const res = await backend.get("k:one")

        expect(res).toStrictEqual({ kind: "miss" })
      })

      it("returns the written values with the clock's timestamp", async () => {
        const values: Values = [5, "five"]

        const timestamp = await backend.set("k:one", values)
        const res = await backend.get("k:one")

        expect(timestamp).toBe(T0.getTime())
        expect(res).toStrictEqual({ kind: "hit", entry: { values, timestamp: T0.getTime() } })
      })

      it("stores the entry and its values frozen", async () => {
        await backend.set("k:one", [1, "one"])

        const res = await backend.get("k:one")

        expect(res.kind).toBe("hit")
        if (res.kind !== "hit") return

        expect(Object.isFrozen(res.entry)).toBe(true)
        expect(Object.isFrozen(res.entry.values)).toBe(true)
      })

      it("overwriting replaces values and timestamp", async () => {
        await backend.set("k:one", [1, "one"])
        clock.advanceMs(250)
        await backend.set("k:one", [2, "two"])

        const res = await backend.get("k:one")

        expect(res).toStrictEqual({
          kind: "hit",
          entry: { values: [2, "two"], timestamp: T0.getTime() + 250 },
        })
      })

      it("get does not refresh the stored timestamp", async () => {
        await backend.set("k:one", [1, "one"])
        clock.advanceMs(1_000)

        await backend.get("k:one")
        const res = await backend.get("k:one")

        expect(res).toStrictEqual({
          kind: "hit",
          entry: { values: [1, "one"], timestamp: T0.getTime() },
        })
      })
    })

    describe("clear semantics", () => {
      it("clearing the written key removes it", async () => {
        await backend.set("k:one", [1, "one"])

        await backend.clear({ kind: "key", key: "k:one" })

        expect(await backend.get("k:one")).toStrictEqual({ kind: "miss" })
      })

      it("clearing everything removes the written key", async () => {
        await backend.set("k:one", [1, "one"])

        await backend.clear({ kind: "all" })

        expect(await backend.get("k:one")).toStrictEqual({ kind: "miss" })
      })

      it("clearing an empty backend is a no-op", async () => {
        await expect(backend.clear({ kind: "all" })).resolves.toBeUndefined()
        expect(await backend.get("k:one")).toStrictEqual({ kind: "miss" })
      })

      it("accepts writes after a clear", async () => {
        await backend.set("k:one", [1, "one"])
        await backend.clear({ kind: "all" })
        await backend.set("k:one", [3, "three"])

        const res = await backend.get("k:one")

        expect(res).toStrictEqual({
          kind: "hit",
          entry: { values: [3, "three"], timestamp: T0.getTime() },
        })
      })
    })
  })
}
