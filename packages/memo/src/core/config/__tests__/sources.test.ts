import { EnvSource, ObjectSource } from "../sources"

describe("EnvSource", () => {
  it("keeps prefixed variables and strips the prefix", async () => {
    const source = new EnvSource({
      env: { MEMO_LOG_LEVEL: "debug", MEMO_DEFAULT_TIMEOUT_MS: "100", PATH: "/bin" },
    })

    expect(await source.load()).toStrictEqual({ LOG_LEVEL: "debug", DEFAULT_TIMEOUT_MS: "100" })
    expect(source.name).toBe("env")
  })

  it("supports a custom prefix", async () => {
    const source = new EnvSource({ prefix: "APP_", env: { APP_LOG_LEVEL: "warn", MEMO_LOG_LEVEL: "debug" } })

    expect(await source.load()).toStrictEqual({ LOG_LEVEL: "warn" })
  })
})

describe("ObjectSource", () => {
  it("returns a copy of the object", async () => {
    const values = { LOG_LEVEL: "info" }
    const source = new ObjectSource(values)

    const loaded = await source.load()

    expect(loaded).toStrictEqual(values)
    expect(loaded).not.toBe(values)
    expect(source.name).toBe("object:overrides")
  })
})
