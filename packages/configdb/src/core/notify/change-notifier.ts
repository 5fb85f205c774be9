import { BaseError, OperationAbortedError } from "@switchconf/errors"
import type { Logger } from "@switchconf/logger"
import { classifyRedisError } from "../../adapters/redis/classify-redis-error"
import type { ChangeHandler, ChangeKind } from "../../ports/change-handler"
import type { Row } from "../../ports/table"
import type { KeyCodec } from "../codec/key-codec"
import { rawToTyped } from "../codec/type-codec"
import type { ConnectionRegistry } from "../registry/connection-registry"
import type { KeyspaceNotificationChannel } from "../registry/notification-channel"
import { HandlerRegistry } from "./handler-registry"
import { type KeyspaceEvent, keyspacePattern } from "./keyspace-event"

export type ChangeNotifierDeps = {
  registry: ConnectionRegistry
  keys: KeyCodec
  logger: Logger
  /** Shared with the owner so registrations outlive this notifier. */
  handlers?: HandlerRegistry | undefined
}

/**
 * Turns keyspace notifications of one database into per-table callbacks with
 * the row's current value.
 *
 * @remarks
 * The change kind comes from checking whether the key still exists after the
 * notification. A write or delete landing in between makes it wrong, so treat
 * it as a hint. The row passed along is read from the notified key at the same
 * time and has the same caveat.
 */
export class ChangeNotifier {
  private readonly handlers: HandlerRegistry
  private readonly logger: Logger
  private channel: KeyspaceNotificationChannel | undefined

  constructor(
    private readonly deps: ChangeNotifierDeps,
    readonly dbName: string,
  ) {
    this.handlers = deps.handlers ?? new HandlerRegistry()
    this.logger = deps.logger.child({ module: "change-notifier", dbName })
  }

  get isListening(): boolean {
    return this.channel !== undefined
  }

  /** @returns a function that removes this registration. */
  subscribe(table: string, handler: ChangeHandler): () => void {
    return this.handlers.add(table, handler)
  }

  /** Remove `handler`, or every handler of `table` when omitted. */
  unsubscribe(table: string, handler?: ChangeHandler): void {
    this.handlers.remove(table, handler)
  }

  /**
   * Dispatch changes until {@link stop} is called.
   *
   * @throws OperationAbortedError when `signal` aborts.
   * Handler errors end the loop and propagate.
   */
  async listen(signal?: AbortSignal): Promise<void> {
    if (this.channel) {
      throw new BaseError("Already listening", {
        code: "already_listening",
        context: { dbName: this.dbName },
        isOperational: false,
      })
    }

    const { id } = this.deps.registry.database(this.dbName)
    const pattern = keyspacePattern(id)
    const channel = await this.deps.registry.openChannel(this.dbName, pattern)

    this.channel = channel
    this.logger.info("Listening for changes", { pattern })

    try {
      for await (const event of channel.events(signal)) {
        await this.dispatch(event)
      }
    } finally {
      this.channel = undefined
      await channel.close()
    }

    if (signal?.aborted) {
      throw new OperationAbortedError("listen", { context: { dbName: this.dbName }, cause: signal.reason })
    }
  }

  /** End a running {@link listen}. */
  async stop(): Promise<void> {
    await this.channel?.close()
  }

  private async dispatch(event: KeyspaceEvent): Promise<void> {
    const parts = this.deps.keys.split(event.key)
    if (!parts) return

    const handlers = this.handlers.handlersFor(parts.table)
    if (handlers.length === 0) return

    const { row, kind } = await this.readChange(event.key)

    this.logger.debug("Dispatching change", { table: parts.table, key: parts.rawKey, count: handlers.length })

    for (const handler of handlers) {
      await handler(parts.table, parts.key, row, kind)
    }
  }

  private async readChange(key: string): Promise<{ row: Row; kind: ChangeKind }> {
    try {
      const client = this.deps.registry.get(this.dbName)
      const row = rawToTyped(await client.hGetAll(key))
      const kind: ChangeKind = (await client.exists(key)) > 0 ? "set" : "deleted"

      return { row, kind }
    } catch (err) {
      throw classifyRedisError(err, { dbName: this.dbName, key })
    }
  }
}
