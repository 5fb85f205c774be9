import { SchemaError } from "@switchconf/errors"
import type { RedisClient, RedisMulti } from "../../ports/redis-client"
import type { ConfigData, ConfigUpdate, RawRow, TableData } from "../../ports/table"
import { rowToRaw } from "../codec/type-codec"
import { INIT_INDICATOR } from "./init-indicator"
import { PerKeyTableStore, type TableStoreDeps } from "./per-key-table-store"

export type PipelinedTableStoreOptions = {
  /** `COUNT` hint per `SCAN` call; also the number of reads per pipeline. */
  scanBatchSize: number
}

const SCAN_START = "0"

function isRawRow(reply: unknown): reply is RawRow {
  return (
    typeof reply === "object" &&
    reply !== null &&
    !Array.isArray(reply) &&
    Object.values(reply).every((v) => typeof v === "string")
  )
}

/**
 * Same contract as {@link PerKeyTableStore}, built for whole tables and
 * snapshots: keys are enumerated with `SCAN` in batches and each batch's
 * reads go out as one pipeline. `modConfig` sends all its writes as a single
 * pipeline.
 */
export class PipelinedTableStore extends PerKeyTableStore {
  constructor(
    deps: TableStoreDeps,
    private readonly opts: PipelinedTableStoreOptions,
  ) {
    super(deps)
  }

  override getTable(table: string): Promise<TableData> {
    return this.run("getTable", table, async (client) => {
      const data: TableData = new Map()

      for await (const batch of this.readBatches(client, this.deps.keys.tablePattern(table))) {
        for (const [hash, raw] of batch) {
          const decoded = this.decode(hash, raw)
          if (decoded) data.set(decoded.rawKey, decoded.entry)
        }
      }

      return data
    })
  }

  override deleteTable(table: string): Promise<void> {
    return this.run("deleteTable", table, async (client) => {
      const pipeline = client.multi()
      const queued = await this.queueTableDelete(client, pipeline, table)

      if (queued > 0) await pipeline.exec()
    })
  }

  override getConfig(): Promise<ConfigData> {
    return this.run("getConfig", "*", async (client) => {
      const config: ConfigData = new Map()

      for await (const batch of this.readBatches(client, "*")) {
        for (const [hash, raw] of batch) {
          this.addToConfig(config, hash, raw)
        }
      }

      return config
    })
  }

  override modConfig(update: ConfigUpdate): Promise<void> {
    return this.run("modConfig", "*", async (client) => {
      const pipeline = client.multi()
      let queued = 0

      for (const [table, rows] of Object.entries(update)) {
        if (rows === null) {
          queued += await this.queueTableDelete(client, pipeline, table)
          continue
        }

        for (const [key, row] of rows) {
          const hash = this.deps.keys.hashKey(table, key)

          if (row === null) pipeline.del(hash)
          else pipeline.hSet(hash, rowToRaw(row))
          queued += 1
        }
      }

      this.logger.debug("Writing snapshot", { operation: "modConfig", count: queued })

      if (queued > 0) await pipeline.exec()
    })
  }

  /** Cursor loop over `pattern`; ends when the cursor comes back to its start. */
  private async *scan(client: RedisClient, pattern: string): AsyncGenerator<string[]> {
    let cursor = SCAN_START

    do {
      const reply = await client.scan(cursor, { MATCH: pattern, COUNT: this.opts.scanBatchSize })
      cursor = reply.cursor
      if (reply.keys.length > 0) yield reply.keys
    } while (cursor !== SCAN_START)
  }

  /** Each scan batch of table keys with its hashes, read in one pipeline. */
  private async *readBatches(client: RedisClient, pattern: string): AsyncGenerator<[string, RawRow][]> {
    for await (const keys of this.scan(client, pattern)) {
      const hashes = keys.filter((k) => k !== INIT_INDICATOR && this.deps.keys.split(k) !== undefined)
      if (hashes.length === 0) continue

      const pipeline = client.multi()
      for (const hash of hashes) pipeline.hGetAll(hash)

      const replies = await pipeline.exec()

      yield hashes.map((hash, i): [string, RawRow] => [hash, this.toRawRow(hash, replies[i])])
    }
  }

  private async queueTableDelete(client: RedisClient, pipeline: RedisMulti, table: string): Promise<number> {
    let queued = 0

    for await (const keys of this.scan(client, this.deps.keys.tablePattern(table))) {
      for (const hash of keys) pipeline.del(hash)
      queued += keys.length
    }

    return queued
  }

  private toRawRow(hash: string, reply: unknown): RawRow {
    if (reply instanceof Error) throw reply
    if (!isRawRow(reply)) {
      throw new SchemaError(`Unexpected reply reading ${hash}`, { context: { key: hash } })
    }
    return reply
  }
}
