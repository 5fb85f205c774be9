import type { Clock } from "@switchconf/clock"
import { ConnectionError, OperationAbortedError, SchemaError } from "@switchconf/errors"
import type { Logger } from "@switchconf/logger"
import { classifyRedisError } from "../../adapters/redis/classify-redis-error"
import type { ReadResult } from "../../ports/read-result"
import type { RedisClient } from "../../ports/redis-client"
import type { ConnectionRegistry } from "../registry/connection-registry"
import type { KeyspaceNotificationChannel } from "../registry/notification-channel"
import type { BlockingPolicy } from "./blocking-policy"

/**
 * What a single attempt saw. `awaiting` is the notification message that
 * signals the data may now be there: the hash name (delivered on keyevent
 * channels) or an event name such as `hset` (delivered on keyspace channels).
 */
export type AttemptFound<T> = { kind: "found"; value: T }
export type AttemptUnavailable = { kind: "unavailable"; awaiting: string; reason: string }
export type AttemptOutcome<T> = AttemptFound<T> | AttemptUnavailable

export type AttemptFn<T> = (client: RedisClient) => Promise<AttemptOutcome<T>>

export type ExecuteOptions = {
  /** Wait (bounded by the policy) for missing data instead of returning `unavailable`. */
  blocking?: boolean | undefined
  /** Cancels reconnect loops and notification waits. */
  signal?: AbortSignal | undefined
}

export type BlockingAccessorDeps = {
  registry: ConnectionRegistry
  clock: Clock
  logger: Logger
}

function found<T>(value: T): AttemptFound<T> {
  return { kind: "found", value }
}

function unavailable(awaiting: string, reason: string): AttemptUnavailable {
  return { kind: "unavailable", awaiting, reason }
}

export const attempt = { found, unavailable }

/**
 * Runs read attempts against a database until they yield data or give up.
 *
 * - Connection failures, while reading or while subscribing: close, back off,
 *   reconnect and try again. Never gives up on its own; use `signal` to bound it.
 * - Schema errors (rejected commands): rethrown at once.
 * - Any other error from an attempt: rethrown unchanged.
 * - Missing data, non-blocking: `unavailable`.
 * - Missing data, blocking: subscribe to keyspace notifications and try again
 *   at once (the data may have landed before the subscription), then wait for
 *   a matching notification, settle, and try again. Once the total wait runs
 *   out, unsubscribe and return `unavailable`.
 */
export class BlockingAccessor {
  private readonly logger: Logger

  constructor(
    private readonly deps: BlockingAccessorDeps,
    private readonly policy: BlockingPolicy,
  ) {
    this.logger = deps.logger.child({ module: "blocking-accessor" })
  }

  async execute<T>(
    dbName: string,
    operation: string,
    fn: AttemptFn<T>,
    options: ExecuteOptions = {},
  ): Promise<ReadResult<T>> {
    const { blocking = false, signal } = options
    const log = this.logger.child({ dbName, operation })
    let failures = 0

    for (;;) {
      this.throwIfAborted(signal, operation, dbName)

      let outcome: AttemptOutcome<T>

      try {
        outcome = await fn(this.deps.registry.get(dbName))
      } catch (err) {
        failures = await this.recover(log, dbName, operation, failures, err, signal)
        continue
      }

      if (outcome.kind === "found") {
        await this.deps.registry.unsubscribeKeyspace(dbName)
        return { kind: "found", value: outcome.value }
      }

      if (!blocking) return { kind: "unavailable" }

      log.warn(outcome.reason)

      const channel = this.deps.registry.channel(dbName)

      if (!channel) {
        try {
          await this.deps.registry.subscribeKeyspace(dbName)
        } catch (err) {
          failures = await this.recover(log, dbName, operation, failures, err, signal)
        }
        continue
      }

      if (await this.awaitNotification(log, channel, outcome.awaiting, signal)) continue

      await this.deps.registry.unsubscribeKeyspace(dbName)
      return { kind: "unavailable" }
    }
  }

  /**
   * Reconnect after a connection failure and return the new failure count.
   * Anything other than a connection failure is rethrown.
   */
  private async recover(
    log: Logger,
    dbName: string,
    operation: string,
    failures: number,
    err: unknown,
    signal: AbortSignal | undefined,
  ): Promise<number> {
    const error = classifyRedisError(err, { dbName, operation })

    if (error instanceof SchemaError) {
      log.error("Bad store request", { err: error })
    }
    if (!(error instanceof ConnectionError)) throw error

    const count = failures + 1
    this.logFailure(log, count, error)
    await this.reconnect(dbName, count, signal)

    return count
  }

  private async awaitNotification(
    log: Logger,
    channel: KeyspaceNotificationChannel,
    awaiting: string,
    signal: AbortSignal | undefined,
  ): Promise<boolean> {
    const { clock } = this.deps
    const startedAt = clock.nowMs()
    const deadline = startedAt + this.policy.maxDataWaitMs

    log.debug("Waiting for notification", { key: awaiting })

    while (clock.nowMs() < deadline) {
      const timeout = Math.min(this.policy.notificationTimeoutMs, deadline - clock.nowMs())
      const event = await channel.nextEvent(timeout, signal)

      this.throwIfAborted(signal, "wait for data", channel.pattern)

      if (event?.message === awaiting) {
        log.info("Data acquired via notification", { key: awaiting, channel: event.channel })
        await clock.sleep(this.policy.settleDelayMs, signal)
        return true
      }

      if (event === null && channel.isClosed) break
    }

    log.warn("No notification received before timeout", {
      key: awaiting,
      waitedMs: clock.nowMs() - startedAt,
    })
    return false
  }

  private async reconnect(dbName: string, failures: number, signal: AbortSignal | undefined): Promise<void> {
    const { registry, clock } = this.deps
    const db = registry.database(dbName)

    await registry.close(dbName)
    await clock.sleep(this.policy.reconnectDelay.getDelay(failures).milliseconds, signal)

    await registry.connect(db, { retryForever: true, signal })
  }

  private logFailure(log: Logger, failures: number, err: ConnectionError): void {
    const { errorThreshold, suppressionThreshold } = this.policy
    const message = "Store access failed, reconnecting"

    if (failures > errorThreshold && failures < suppressionThreshold) {
      log.error(message, { attempt: failures, err })
    } else {
      log.warn(message, { attempt: failures, err })
    }
  }

  private throwIfAborted(signal: AbortSignal | undefined, operation: string, target: string): void {
    if (signal?.aborted) {
      throw new OperationAbortedError(operation, { context: { target }, cause: signal.reason })
    }
  }
}
