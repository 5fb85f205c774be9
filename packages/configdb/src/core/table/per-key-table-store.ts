import type { Logger } from "@switchconf/logger"
import { classifyRedisError } from "../../adapters/redis/classify-redis-error"
import type { RedisClient } from "../../ports/redis-client"
import type {
  ConfigData,
  ConfigUpdate,
  RawRow,
  Row,
  RowInput,
  RowKey,
  TableData,
  TableEntry,
} from "../../ports/table"
import type { TableStore } from "../../ports/table-store"
import type { KeyCodec } from "../codec/key-codec"
import { rawToTyped, rowToRaw, storedFieldName } from "../codec/type-codec"

export type TableStoreDeps = {
  /** Current connection; looked up per call so reconnects are picked up. */
  client: () => RedisClient
  keys: KeyCodec
  logger: Logger
}

type DecodedEntry = {
  table: string
  rawKey: string
  entry: TableEntry
}

/**
 * One command per key: `KEYS` to enumerate, then `HGETALL`/`HSET`/`DEL`
 * per row.
 */
export class PerKeyTableStore implements TableStore {
  protected readonly logger: Logger

  constructor(protected readonly deps: TableStoreDeps) {
    this.logger = deps.logger.child({ module: "table-store" })
  }

  getEntry(table: string, key: RowKey): Promise<Row> {
    return this.run("getEntry", table, async (client) =>
      rawToTyped(await client.hGetAll(this.deps.keys.hashKey(table, key))),
    )
  }

  setEntry(table: string, key: RowKey, row: RowInput | null): Promise<void> {
    const hash = this.deps.keys.hashKey(table, key)

    return this.run("setEntry", table, async (client) => {
      if (row === null) {
        await client.del(hash)
        return
      }

      const current = rawToTyped(await client.hGetAll(hash))
      await client.hSet(hash, rowToRaw(row))

      const stale = Object.entries(current)
        .filter(([field, value]) => {
          const next = row[field]
          return next === undefined || storedFieldName(field, next) !== storedFieldName(field, value)
        })
        .map(([field, value]) => storedFieldName(field, value))

      if (stale.length > 0) await client.hDel(hash, stale)
    })
  }

  modEntry(table: string, key: RowKey, row: RowInput | null): Promise<void> {
    const hash = this.deps.keys.hashKey(table, key)

    return this.run("modEntry", table, async (client) => {
      if (row === null) await client.del(hash)
      else await client.hSet(hash, rowToRaw(row))
    })
  }

  getTable(table: string): Promise<TableData> {
    return this.run("getTable", table, async (client) => {
      const data: TableData = new Map()

      for (const hash of await client.keys(this.deps.keys.tablePattern(table))) {
        const decoded = this.decode(hash, await client.hGetAll(hash))
        if (decoded) data.set(decoded.rawKey, decoded.entry)
      }

      return data
    })
  }

  deleteTable(table: string): Promise<void> {
    return this.run("deleteTable", table, async (client) => {
      for (const hash of await client.keys(this.deps.keys.tablePattern(table))) {
        await client.del(hash)
      }
    })
  }

  getKeys(table: string, split: boolean = true): Promise<RowKey[]> {
    const { keys } = this.deps

    return this.run("getKeys", table, async (client) => {
      const result: RowKey[] = []

      for (const hash of await client.keys(keys.tablePattern(table))) {
        const parts = keys.split(hash)
        if (!parts) continue
        result.push(split ? parts.key : keys.deserialize(hash))
      }

      return result
    })
  }

  getConfig(): Promise<ConfigData> {
    return this.run("getConfig", "*", async (client) => {
      const config: ConfigData = new Map()

      for (const hash of await client.keys("*")) {
        if (!this.deps.keys.split(hash)) continue

        this.addToConfig(config, hash, await client.hGetAll(hash))
      }

      return config
    })
  }

  async modConfig(update: ConfigUpdate): Promise<void> {
    for (const [table, rows] of Object.entries(update)) {
      if (rows === null) {
        await this.deleteTable(table)
        continue
      }

      for (const [key, row] of rows) {
        await this.modEntry(table, key, row)
      }
    }
  }

  /**
   * Decode the hash read at `hash`. Keys without a separator and hashes that
   * vanished since enumeration yield `undefined`.
   */
  protected decode(hash: string, raw: Readonly<RawRow>): DecodedEntry | undefined {
    const parts = this.deps.keys.split(hash)
    if (!parts || Object.keys(raw).length === 0) return undefined

    return { table: parts.table, rawKey: parts.rawKey, entry: { key: parts.key, row: rawToTyped(raw) } }
  }

  protected addToConfig(config: ConfigData, hash: string, raw: Readonly<RawRow>): void {
    const decoded = this.decode(hash, raw)
    if (!decoded) return

    let data = config.get(decoded.table)
    if (!data) {
      data = new Map()
      config.set(decoded.table, data)
    }
    data.set(decoded.rawKey, decoded.entry)
  }

  /** Run `fn` on the current connection, mapping driver failures to store errors. */
  protected async run<T>(operation: string, table: string, fn: (client: RedisClient) => Promise<T>): Promise<T> {
    try {
      return await fn(this.deps.client())
    } catch (err) {
      const error = classifyRedisError(err, { table, operation })
      this.logger.debug("Table operation failed", { table, operation, err: error })
      throw error
    }
  }
}
