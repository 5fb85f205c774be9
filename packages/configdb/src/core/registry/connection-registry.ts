import type { Clock } from "@switchconf/clock"
import { ConnectionError, MissingClientError, OperationAbortedError } from "@switchconf/errors"
import type { Logger } from "@switchconf/logger"
import { classifyRedisError } from "../../adapters/redis/classify-redis-error"
import type { DatabaseInfo } from "../../ports/database"
import type { RedisClient, RedisClientFactory } from "../../ports/redis-client"
import type { DelayPolicy } from "../blocking/delay-policy"
import { ANY_KEYSPACE_PATTERN } from "../notify/keyspace-event"
import { KeyspaceNotificationChannel } from "./notification-channel"

export type ConnectionRegistryDeps = {
  clientFactory: RedisClientFactory
  clock: Clock
  logger: Logger
}

export type ConnectionRegistryOptions = {
  /** Wait between attempts of a persistent connect. */
  reconnectDelay: DelayPolicy
  /** Value written to `notify-keyspace-events` on every new connection. */
  keyspaceEvents: string
}

export type ConnectOptions = {
  /** Retry until connected instead of failing on the first error. */
  retryForever?: boolean | undefined
  signal?: AbortSignal | undefined
}

type DatabaseHandle = {
  db: DatabaseInfo
  client: RedisClient
  /** Open while a blocking read waits for data on this database. */
  keyspace?: KeyspaceNotificationChannel | undefined
}

/**
 * One live connection per logical database name.
 */
export class ConnectionRegistry {
  private readonly handles = new Map<string, DatabaseHandle>()
  private readonly logger: Logger

  constructor(
    private readonly deps: ConnectionRegistryDeps,
    private readonly opts: ConnectionRegistryOptions,
  ) {
    this.logger = deps.logger.child({ module: "connection-registry" })
  }

  has(dbName: string): boolean {
    return this.handles.has(dbName)
  }

  /**
   * Register a connection for `db`. A name that is already connected keeps
   * its connection.
   *
   * @throws ConnectionError on failure when `retryForever` is off.
   * @throws OperationAbortedError when `signal` aborts a persistent connect.
   */
  async connect(db: DatabaseInfo, options: ConnectOptions = {}): Promise<RedisClient> {
    const existing = this.handles.get(db.name)
    if (existing) return existing.client

    const client = options.retryForever
      ? await this.connectPersistent(db, options.signal)
      : await this.connectOnce(db)

    this.handles.set(db.name, { db, client })
    this.logger.debug("Connected", { dbName: db.name, dbId: db.id })

    return client
  }

  private async connectOnce(db: DatabaseInfo): Promise<RedisClient> {
    const client = this.deps.clientFactory(db.id)

    client.on("error", (err) => {
      this.logger.debug("Client error event", { dbName: db.name, err })
    })

    try {
      await client.connect()
      await client.configSet("notify-keyspace-events", this.opts.keyspaceEvents)
      return client
    } catch (err) {
      await this.release(client, db.name)
      throw classifyRedisError(err, { dbName: db.name, dbId: db.id })
    }
  }

  private async connectPersistent(db: DatabaseInfo, signal?: AbortSignal): Promise<RedisClient> {
    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) throw new OperationAbortedError("connect", { context: { dbName: db.name } })

      try {
        return await this.connectOnce(db)
      } catch (err) {
        if (!(err instanceof ConnectionError)) throw err

        const delay = this.opts.reconnectDelay.getDelay(attempt)
        this.logger.warn("Connection failed, retrying", {
          dbName: db.name,
          attempt,
          delayMs: delay.milliseconds,
          err,
        })

        await this.deps.clock.sleep(delay.milliseconds, signal)
      }
    }
  }

  /** Release the connection and any notification channel for `dbName`. Idempotent. */
  async close(dbName: string): Promise<void> {
    const handle = this.handles.get(dbName)
    if (!handle) return

    this.handles.delete(dbName)

    if (handle.keyspace) await this.closeChannel(handle.keyspace, dbName)
    await this.release(handle.client, dbName)
  }

  async closeAll(): Promise<void> {
    for (const name of [...this.handles.keys()]) {
      await this.close(name)
    }
  }

  /** @throws MissingClientError when `dbName` was never connected or is closed. */
  get(dbName: string): RedisClient {
    return this.handle(dbName).client
  }

  database(dbName: string): DatabaseInfo {
    return this.handle(dbName).db
  }

  /** Channel opened by {@link subscribeKeyspace}, if any. */
  channel(dbName: string): KeyspaceNotificationChannel | undefined {
    return this.handles.get(dbName)?.keyspace
  }

  /**
   * Subscribe `dbName` to every keyspace and keyevent notification. Reuses an
   * open channel.
   */
  async subscribeKeyspace(dbName: string): Promise<KeyspaceNotificationChannel> {
    const handle = this.handle(dbName)
    if (handle.keyspace) return handle.keyspace

    handle.keyspace = await this.openChannel(dbName, ANY_KEYSPACE_PATTERN)
    this.logger.debug("Subscribed to keyspace notifications", { dbName, pattern: ANY_KEYSPACE_PATTERN })

    return handle.keyspace
  }

  async unsubscribeKeyspace(dbName: string): Promise<void> {
    const handle = this.handles.get(dbName)
    const channel = handle?.keyspace
    if (!handle || !channel) return

    handle.keyspace = undefined
    await this.closeChannel(channel, dbName)
  }

  /**
   * Open a channel on `pattern` over a duplicate of the `dbName` connection.
   * The caller owns the channel and must close it.
   */
  async openChannel(dbName: string, pattern: string): Promise<KeyspaceNotificationChannel> {
    const handle = this.handle(dbName)

    try {
      return await KeyspaceNotificationChannel.open(handle.client, pattern, this.deps.clock)
    } catch (err) {
      throw classifyRedisError(err, { dbName, pattern })
    }
  }

  private handle(dbName: string): DatabaseHandle {
    const handle = this.handles.get(dbName)
    if (!handle) throw new MissingClientError(dbName)
    return handle
  }

  private async closeChannel(channel: KeyspaceNotificationChannel, dbName: string): Promise<void> {
    try {
      await channel.close()
    } catch (err) {
      this.logger.warn("Dropping notification channel that failed to close", { dbName, err })
    }
  }

  private async release(client: RedisClient, dbName: string): Promise<void> {
    if (!client.isOpen) return

    try {
      await client.quit()
    } catch (err) {
      this.logger.warn("Dropping connection that failed to close", { dbName, err })
    }
  }
}
