import { SystemClock } from "../clock"

describe("SystemClock", () => {
  it("reads wall-clock time", () => {
    const clock = new SystemClock()
    const before = Date.now()

    const ms = clock.nowMs()
    const date = clock.now()

    expect(ms).toBeGreaterThanOrEqual(before)
    expect(date.getTime()).toBeGreaterThanOrEqual(ms)
  })
})
