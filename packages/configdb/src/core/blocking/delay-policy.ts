import type { Milliseconds } from "@switchconf/clock"

export type Delay = { milliseconds: Milliseconds }

/** Delay before reconnect attempt `attempt` (1-based). */
export interface DelayPolicy {
  getDelay(attempt: number): Delay
}

/** Same delay every time. */
export function constantDelay(delay: Delay): DelayPolicy {
  return {
    getDelay: () => ({ milliseconds: delay.milliseconds }),
  }
}

export type ExponentialDelayOptions = {
  base: Delay
  max: Delay
  /** Default: 2 */
  factor?: number
}

/** `base * factor^(attempt - 1)`, capped at `max`. */
export function exponentialDelay(options: ExponentialDelayOptions): DelayPolicy {
  const { base, max, factor = 2 } = options

  if (!Number.isFinite(base.milliseconds) || base.milliseconds < 0) {
    throw new RangeError(`base.milliseconds must be finite and >= 0 (got ${base.milliseconds})`)
  }
  if (max.milliseconds < base.milliseconds) {
    throw new RangeError(`max.milliseconds must be >= base.milliseconds (got ${max.milliseconds})`)
  }

  return {
    getDelay(attempt: number): Delay {
      const raw = base.milliseconds * factor ** Math.max(0, attempt - 1)

      return { milliseconds: Math.floor(Math.min(raw, max.milliseconds)) }
    },
  }
}
