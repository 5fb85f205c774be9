import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"
import { sleepAborted } from "./system-clock"

export type FakeClockSleep = {
  readonly ms: Milliseconds
  readonly at: UnixMs
}

/**
 * Deterministic clock for tests.
 *
 * @remarks
 * `sleep()` resolves on the next microtask and moves time forward by the
 * requested duration, so loops bounded by a deadline terminate without real
 * waiting. Every sleep is recorded in `sleeps`. An aborted signal rejects the
 * same way `SystemClock` does.
 */
export class FakeClock implements Clock {
  readonly sleeps: FakeClockSleep[] = []
  private time: UnixMs

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw sleepAborted(signal)

    this.sleeps.push({ ms, at: this.time })
    this.advance(Math.max(0, ms))
  }

  /** Total time spent in `sleep()` so far. */
  sleptMs(): Milliseconds {
    return this.sleeps.reduce((total, s) => total + s.ms, 0)
  }
}
