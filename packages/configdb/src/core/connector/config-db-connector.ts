import { MissingClientError, OperationAbortedError } from "@switchconf/errors"
import type { Logger } from "@switchconf/logger"
import { classifyRedisError } from "../../adapters/redis/classify-redis-error"
import type { ChangeHandler } from "../../ports/change-handler"
import type { RedisClient, RedisMulti } from "../../ports/redis-client"
import type {
  ConfigData,
  ConfigUpdate,
  RawRow,
  Row,
  RowInput,
  RowKey,
  TableData,
} from "../../ports/table"
import type { TableStore } from "../../ports/table-store"
import { KeyCodec } from "../codec/key-codec"
import { ChangeNotifier } from "../notify/change-notifier"
import { HandlerRegistry } from "../notify/handler-registry"
import { keyspacePattern } from "../notify/keyspace-event"
import { INIT_INDICATOR } from "../table/init-indicator"
import { PerKeyTableStore } from "../table/per-key-table-store"
import { PipelinedTableStore } from "../table/pipelined-table-store"
import type { DbConnector } from "./db-connector"

export type TableStrategy = "per-key" | "pipelined"

export type ConfigDbConnectorOptions = {
  /** Default: `CONFIG_DB` */
  dbName?: string
  /** Default: `"per-key"` */
  strategy?: TableStrategy
  /** Used by the pipelined strategy. Default: 30 */
  scanBatchSize?: number
}

export type ConfigDbConnectOptions = {
  /** Wait until the init indicator is set. Default: true */
  waitForInit?: boolean | undefined
  /** Default: false */
  retryForever?: boolean | undefined
  signal?: AbortSignal | undefined
}

type Session = {
  client: () => RedisClient
  keys: KeyCodec
  store: TableStore
  notifier: ChangeNotifier
}

function isRawRow(reply: unknown): reply is RawRow {
  return typeof reply === "object" && reply !== null && Object.values(reply).every((v) => typeof v === "string")
}

/**
 * Table-level access to one configuration database.
 *
 * @example
 * ```ts
 * const configDb = new ConfigDbConnector(connector)
 * await configDb.connect()
 * await configDb.modEntry("BGP_NEIGHBOR", "10.0.0.1", { admin_status: "up" })
 *
 * configDb.subscribe("BGP_NEIGHBOR", (table, key, row) => logger.info("changed", { table }))
 * await configDb.listen()
 * ```
 */
export class ConfigDbConnector implements TableStore {
  readonly dbName: string
  private readonly strategy: TableStrategy
  private readonly scanBatchSize: number
  private readonly logger: Logger
  private readonly handlers = new HandlerRegistry()
  private session: Session | undefined

  constructor(
    private readonly connector: DbConnector,
    options: ConfigDbConnectorOptions = {},
  ) {
    this.dbName = options.dbName ?? "CONFIG_DB"
    this.strategy = options.strategy ?? "per-key"
    this.scanBatchSize = options.scanBatchSize ?? 30
    this.logger = connector.logger.child({ module: "config-db", dbName: this.dbName })
  }

  /**
   * Connect, or keep the session that is already live. Handlers registered
   * with {@link subscribe} carry over to every session.
   */
  async connect(options: ConfigDbConnectOptions = {}): Promise<void> {
    const { waitForInit = true, retryForever = false, signal } = options

    if (!this.session || !this.connector.registry.has(this.dbName)) {
      await this.session?.notifier.stop()
      await this.connector.connect(this.dbName, { retryForever, signal })
      this.session = this.openSession()
    }

    if (waitForInit) await this.waitForInit(signal)
  }

  async close(): Promise<void> {
    await this.session?.notifier.stop()
    this.session = undefined
    await this.connector.close(this.dbName)
  }

  get separator(): string {
    return this.current().keys.separator
  }

  serializeKey(key: RowKey): string {
    return this.current().keys.serialize(key)
  }

  deserializeKey(raw: string): RowKey {
    return this.current().keys.deserialize(raw)
  }

  getEntry(table: string, key: RowKey): Promise<Row> {
    return this.current().store.getEntry(table, key)
  }

  setEntry(table: string, key: RowKey, row: RowInput | null): Promise<void> {
    return this.current().store.setEntry(table, key, row)
  }

  modEntry(table: string, key: RowKey, row: RowInput | null): Promise<void> {
    return this.current().store.modEntry(table, key, row)
  }

  getTable(table: string): Promise<TableData> {
    return this.current().store.getTable(table)
  }

  deleteTable(table: string): Promise<void> {
    return this.current().store.deleteTable(table)
  }

  getKeys(table: string, split: boolean = true): Promise<RowKey[]> {
    return this.current().store.getKeys(table, split)
  }

  getConfig(): Promise<ConfigData> {
    return this.current().store.getConfig()
  }

  modConfig(update: ConfigUpdate): Promise<void> {
    return this.current().store.modConfig(update)
  }

  /** Write raw hashes in one pipeline. */
  async setBulk(payload: Iterable<readonly [string, RawRow]>): Promise<void> {
    await this.pipeline("setBulk", (pipe) => {
      for (const [hash, raw] of payload) pipe.hSet(hash, raw)
    })
  }

  /** Delete whole hashes in one pipeline. */
  async delBulk(hashes: Iterable<string>): Promise<void> {
    await this.pipeline("delBulk", (pipe) => {
      for (const hash of hashes) pipe.del(hash)
    })
  }

  /** Delete single fields in one pipeline. */
  async hdelBulk(payload: Iterable<readonly [string, string]>): Promise<void> {
    await this.pipeline("hdelBulk", (pipe) => {
      for (const [hash, field] of payload) pipe.hDel(hash, field)
    })
  }

  /** Read raw hashes in one pipeline, in request order. A missing hash reads as `{}`. */
  async getAllBulk(hashes: readonly string[]): Promise<RawRow[]> {
    const replies = await this.pipeline("getAllBulk", (pipe) => {
      for (const hash of hashes) pipe.hGetAll(hash)
    })

    return replies.map((reply) => {
      if (reply instanceof Error) throw classifyRedisError(reply, { dbName: this.dbName, operation: "getAllBulk" })
      return isRawRow(reply) ? reply : {}
    })
  }

  /**
   * Call `handler` on every change to `table`. Takes effect immediately, also
   * while listening, and may be called before `connect()`.
   *
   * @returns a function that removes this registration.
   */
  subscribe(table: string, handler: ChangeHandler): () => void {
    return this.handlers.add(table, handler)
  }

  /** Remove `handler`, or every handler of `table` when omitted. */
  unsubscribe(table: string, handler?: ChangeHandler): void {
    this.handlers.remove(table, handler)
  }

  /** Dispatch changes to subscribed handlers until {@link stop}. */
  listen(signal?: AbortSignal): Promise<void> {
    return this.current().notifier.listen(signal)
  }

  async stop(): Promise<void> {
    await this.session?.notifier.stop()
  }

  private openSession(): Session {
    const { registry } = this.connector
    const keys = new KeyCodec(this.connector.separator(this.dbName))
    const client = () => registry.get(this.dbName)
    const deps = { client, keys, logger: this.logger }

    const store =
      this.strategy === "pipelined"
        ? new PipelinedTableStore(deps, { scanBatchSize: this.scanBatchSize })
        : new PerKeyTableStore(deps)

    const notifier = new ChangeNotifier({ registry, keys, logger: this.logger, handlers: this.handlers }, this.dbName)

    return { client, keys, store, notifier }
  }

  private current(): Session {
    if (!this.session) throw new MissingClientError(this.dbName)
    return this.session
  }

  private async pipeline(
    operation: string,
    queue: (pipe: RedisMulti) => void,
  ): Promise<unknown[]> {
    try {
      const pipe = this.current().client().multi()
      queue(pipe)
      return await pipe.exec()
    } catch (err) {
      throw classifyRedisError(err, { dbName: this.dbName, operation })
    }
  }

  /**
   * Block until the init indicator key is set. The key is checked again after
   * subscribing, so a write between the first check and the subscription is
   * not missed.
   */
  private async waitForInit(signal: AbortSignal | undefined): Promise<void> {
    const { registry } = this.connector
    const client = registry.get(this.dbName)
    const isInitialized = async () => Boolean(await client.get(INIT_INDICATOR))

    try {
      if (await isInitialized()) return

      const pattern = keyspacePattern(registry.database(this.dbName).id, INIT_INDICATOR)
      const channel = await registry.openChannel(this.dbName, pattern)
      this.logger.info("Waiting for database initialization", { pattern })

      try {
        if (await isInitialized()) return

        for await (const event of channel.events(signal)) {
          if (event.key === INIT_INDICATOR && (await isInitialized())) return
        }
      } finally {
        await channel.close()
      }
    } catch (err) {
      throw classifyRedisError(err, { dbName: this.dbName, operation: "waitForInit" })
    }

    throw new OperationAbortedError("wait for init", { context: { dbName: this.dbName }, cause: signal?.reason })
  }
}
