import { OperationAbortedError } from "@switchconf/errors"
import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

export function sleepAborted(signal: AbortSignal): OperationAbortedError {
  return new OperationAbortedError("sleep", { cause: signal.reason })
}

/** Wall-clock time and timer-backed sleeps. */
export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): UnixMs {
    return Date.now()
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return Promise.reject(sleepAborted(signal))
    if (ms <= 0) return Promise.resolve()

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer)
        if (signal) reject(sleepAborted(signal))
      }

      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort)
        resolve()
      }, ms)

      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }
}
