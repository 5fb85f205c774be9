import type { Clock, Milliseconds } from "@switchconf/clock"
import type { RedisClient } from "../../ports/redis-client"
import { type KeyspaceEvent, parseKeyspaceEvent } from "../notify/keyspace-event"

type Waiter = (event: KeyspaceEvent | null) => void

/**
 * A pattern subscription on a dedicated connection, buffering messages until
 * they are consumed.
 *
 * @remarks
 * Subscribed connections cannot issue ordinary commands, hence the duplicate
 * client. Closing the channel wakes every pending consumer with `null`.
 */
export class KeyspaceNotificationChannel {
  private readonly queue: KeyspaceEvent[] = []
  private readonly waiters = new Set<Waiter>()
  private closed = false

  private constructor(
    private readonly subscriber: RedisClient,
    readonly pattern: string,
    private readonly clock: Clock,
  ) {}

  /** The duplicate connection is dropped again when connecting or subscribing fails. */
  static async open(client: RedisClient, pattern: string, clock: Clock): Promise<KeyspaceNotificationChannel> {
    const subscriber = client.duplicate()
    const channel = new KeyspaceNotificationChannel(subscriber, pattern, clock)

    try {
      await subscriber.connect()
      await subscriber.pSubscribe(pattern, (message, name) => channel.deliver(name, message))
    } catch (err) {
      channel.closed = true
      if (subscriber.isOpen) {
        await subscriber.disconnect().catch((disconnectErr: unknown) => {
          throw new AggregateError([err, disconnectErr], "Subscription failed and its connection did not close", {
            cause: err,
          })
        })
      }
      throw err
    }

    return channel
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Messages received and not yet consumed. */
  get pending(): number {
    return this.queue.length
  }

  private deliver(channel: string, message: string): void {
    if (this.closed) return

    const event = parseKeyspaceEvent(channel, message)
    const [waiter] = this.waiters

    if (waiter) {
      this.waiters.delete(waiter)
      waiter(event)
    } else {
      this.queue.push(event)
    }
  }

  /**
   * Next message, or `null` once `timeoutMs` passes, the channel closes or
   * `signal` aborts.
   */
  nextEvent(timeoutMs: Milliseconds, signal?: AbortSignal): Promise<KeyspaceEvent | null> {
    return this.take(signal, timeoutMs)
  }

  /** Messages until the channel closes or `signal` aborts. */
  async *events(signal?: AbortSignal): AsyncGenerator<KeyspaceEvent, void, undefined> {
    for (;;) {
      const event = await this.take(signal)
      if (event === null) return
      yield event
    }
  }

  private async take(signal?: AbortSignal, timeoutMs?: Milliseconds): Promise<KeyspaceEvent | null> {
    const queued = this.queue.shift()
    if (queued) return queued
    if (this.closed || signal?.aborted) return null

    const stop = new AbortController()
    const onAbort = () => stop.abort()
    signal?.addEventListener("abort", onAbort, { once: true })

    let waiter: Waiter = () => {}

    try {
      return await new Promise<KeyspaceEvent | null>((resolve) => {
        waiter = resolve
        this.waiters.add(waiter)

        stop.signal.addEventListener("abort", () => resolve(null), { once: true })

        if (timeoutMs !== undefined) {
          this.clock.sleep(timeoutMs, stop.signal).then(
            () => resolve(null),
            () => resolve(null),
          )
        }
      })
    } finally {
      this.waiters.delete(waiter)
      signal?.removeEventListener("abort", onAbort)
      stop.abort()
    }
  }

  /** Unsubscribe and release the connection. Idempotent. */
  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true

    this.queue.length = 0
    for (const waiter of this.waiters) waiter(null)
    this.waiters.clear()

    if (this.subscriber.isOpen) {
      await this.subscriber.pUnsubscribe(this.pattern)
      await this.subscriber.quit()
    }
  }
}
