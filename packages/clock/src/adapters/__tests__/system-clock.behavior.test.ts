import { OperationAbortedError } from "@switchconf/errors"
import { SystemClock } from "../system-clock"

describe("SystemClock behavior", () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("resolves once the duration elapses", async () => {
    const clock = new SystemClock()
    let done = false

    const p = clock.sleep(1_000).then(() => {
      done = true
    })

    await vi.advanceTimersByTimeAsync(999)
    expect(done).toBe(false)

    await vi.advanceTimersByTimeAsync(1)
    await p
    expect(done).toBe(true)
  })

  it("rejects early and clears its timer when aborted mid-sleep", async () => {
    const clearTimeoutSpy = vi.spyOn(globalThis, "clearTimeout")
    const clock = new SystemClock()
    const ac = new AbortController()

    const p = clock.sleep(5_000, ac.signal)
    ac.abort()

    await expect(p).rejects.toBeInstanceOf(OperationAbortedError)

    expect(clearTimeoutSpy).toHaveBeenCalledTimes(1)
    expect(vi.getTimerCount()).toBe(0)
  })
})
