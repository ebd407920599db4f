import { SystemClock } from "../system-clock"

describe("SystemClock behavior", () => {
  it("now() and nowMs() agree", () => {
    const clock = new SystemClock()

    expect(Math.abs(clock.now().getTime() - clock.nowMs())).toBeLessThan(5)
  })

  it("resolves after the delay elapses", async () => {
    const clock = new SystemClock()
    const start = Date.now()

    await clock.sleep(30)

    expect(Date.now() - start).toBeGreaterThanOrEqual(25)
  })

  it("resolves immediately for non-positive delays", async () => {
    await expect(new SystemClock().sleep(0)).resolves.toBeUndefined()
  })

  it("rejects with AbortError when aborted mid-sleep", async () => {
    const clock = new SystemClock()
    const ac = new AbortController()

    const pending = clock.sleep(5_000, ac.signal)
    setTimeout(() => ac.abort(), 20)

    await expect(pending).rejects.toMatchObject({ name: "AbortError" })
  })

  it("rejects at once when the signal is already aborted", async () => {
    const ac = new AbortController()
    ac.abort()

    await expect(new SystemClock().sleep(5_000, ac.signal)).rejects.toMatchObject({
      name: "AbortError",
    })
  })
})
