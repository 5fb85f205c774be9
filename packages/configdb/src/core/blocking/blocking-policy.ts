import type { Milliseconds } from "@switchconf/clock"
import { constantDelay, type DelayPolicy } from "./delay-policy"

export type BlockingPolicy = {
  /** Wait before reopening a failed connection. */
  reconnectDelay: DelayPolicy
  /** Longest wait for any single notification. */
  notificationTimeoutMs: Milliseconds
  /** Longest total wait for the awaited data to appear. */
  maxDataWaitMs: Milliseconds
  /** Pause after a matching notification, letting the writer finish. */
  settleDelayMs: Milliseconds
  /** Consecutive connection failures after which they are logged as errors. */
  errorThreshold: number
  /** Consecutive connection failures after which they drop back to warnings. */
  suppressionThreshold: number
}

export const defaultBlockingPolicy: BlockingPolicy = {
  reconnectDelay: constantDelay({ milliseconds: 10_000 }),
  notificationTimeoutMs: 10_000,
  maxDataWaitMs: 60_000,
  settleDelayMs: 3_000,
  errorThreshold: 10,
  suppressionThreshold: 15,
}
