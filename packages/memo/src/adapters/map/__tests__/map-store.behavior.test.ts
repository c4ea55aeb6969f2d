import { MapStore } from "../map-store"

describe("MapStore", () => {
  let store: MapStore

  beforeEach(() => {
    store = new MapStore()
  })

  it("stores and returns entries by key", () => {
    const entry = { values: [1], timestamp: 10 }

    store.set("k", entry)

    expect(store.get("k")).toBe(entry)
    expect(store.size()).toBe(1)
  })

  it("delete reports whether the key existed", () => {
    store.set("k", { values: [1], timestamp: 10 })

    expect(store.delete("k")).toBe(true)
    expect(store.delete("k")).toBe(false)
    expect(store.get("k")).toBeUndefined()
  })

  it("keys() returns a snapshot unaffected by later deletes", () => {
    store.set("a", { values: [1], timestamp: 10 })
    store.set("b", { values: [2], timestamp: 10 })

    const snapshot = store.keys()
    store.clear()

    expect(snapshot).toStrictEqual(["a", "b"])
    expect(store.size()).toBe(0)
  })
})
