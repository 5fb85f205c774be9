import { type Clock, SystemClock } from "@switchconf/clock"
import { createNullLogger, createPinoLogger, type Logger } from "@switchconf/logger"
import { classifyRedisError } from "../../adapters/redis/classify-redis-error"
import { createRedisClientFactory } from "../../adapters/redis/create-redis-client"
import type { ConnectorConfig } from "../../config/connector-config"
import type { DatabaseCatalog } from "../../config/database-catalog"
import type { DatabaseInfo } from "../../ports/database"
import type { ReadResult } from "../../ports/read-result"
import type { RedisClient, RedisClientFactory } from "../../ports/redis-client"
import { type AttemptFn, attempt, BlockingAccessor, type ExecuteOptions } from "../blocking/blocking-accessor"
import type { BlockingPolicy } from "../blocking/blocking-policy"
import { ConnectionRegistry, type ConnectOptions } from "../registry/connection-registry"
import { requireFound } from "./require-found"

/** Stored field value that reads back as `null`. */
const NULL_VALUE = "None"

export type DbConnectorDeps = {
  catalog: DatabaseCatalog
  clientFactory: RedisClientFactory
  clock: Clock
  logger: Logger
}

export type DbConnectorOptions = {
  blocking: BlockingPolicy
  keyspaceEvents: string
}

export type StoredValue = string | null

function decodeValue(value: string): StoredValue {
  return value === NULL_VALUE ? null : value
}

/**
 * Primitive access to any database in the catalog.
 *
 * Reads report missing data as `unavailable`; with `blocking` they first wait
 * for the data to be written. All primitives ride out connection failures by
 * reconnecting (see {@link BlockingAccessor}).
 */
export class DbConnector {
  readonly registry: ConnectionRegistry
  readonly accessor: BlockingAccessor
  readonly logger: Logger

  constructor(
    private readonly deps: DbConnectorDeps,
    opts: DbConnectorOptions,
  ) {
    this.logger = deps.logger
    this.registry = new ConnectionRegistry(deps, {
      reconnectDelay: opts.blocking.reconnectDelay,
      keyspaceEvents: opts.keyspaceEvents,
    })
    this.accessor = new BlockingAccessor(
      { registry: this.registry, clock: deps.clock, logger: deps.logger },
      opts.blocking,
    )
  }

  static fromConfig(
    config: ConnectorConfig,
    catalog: DatabaseCatalog,
    overrides: Partial<Omit<DbConnectorDeps, "catalog">> = {},
  ): DbConnector {
    return new DbConnector(
      {
        catalog,
        clientFactory: overrides.clientFactory ?? createRedisClientFactory(config.redis),
        clock: overrides.clock ?? new SystemClock(),
        logger: overrides.logger ?? createPinoLogger({}, config.log, { service: "switchconf" }),
      },
      { blocking: config.blocking, keyspaceEvents: config.keyspaceEvents },
    )
  }

  /** A connector that logs nothing, for tests and embedding. */
  static quiet(deps: Omit<DbConnectorDeps, "logger">, opts: DbConnectorOptions): DbConnector {
    return new DbConnector({ ...deps, logger: createNullLogger() }, opts)
  }

  database(dbName: string): DatabaseInfo {
    return this.deps.catalog.resolve(dbName)
  }

  dbId(dbName: string): number {
    return this.database(dbName).id
  }

  separator(dbName: string): string {
    return this.database(dbName).separator
  }

  /** Persistent by default: keeps retrying until the store answers. */
  async connect(dbName: string, options: ConnectOptions = {}): Promise<void> {
    await this.registry.connect(this.database(dbName), { ...options, retryForever: options.retryForever ?? true })
  }

  close(dbName: string): Promise<void> {
    return this.registry.close(dbName)
  }

  closeAll(): Promise<void> {
    return this.registry.closeAll()
  }

  /** @throws MissingClientError when `dbName` is not connected. */
  client(dbName: string): RedisClient {
    return this.registry.get(dbName)
  }

  /** All keys matching `pattern`. An empty database is `unavailable`. */
  keys(dbName: string, pattern: string = "*", options?: ExecuteOptions): Promise<ReadResult<string[]>> {
    return this.accessor.execute(
      dbName,
      "keys",
      async (client) => {
        const keys = await client.keys(pattern)
        return keys.length > 0
          ? attempt.found(keys)
          : attempt.unavailable("hset", `Database "${dbName}" is empty`)
      },
      options,
    )
  }

  /** Field `field` of hash `hash`. A missing or empty value is `unavailable`. */
  get(dbName: string, hash: string, field: string, options?: ExecuteOptions): Promise<ReadResult<StoredValue>> {
    return this.accessor.execute(
      dbName,
      "get",
      async (client) => {
        const value = await client.hGet(hash, field)
        return value
          ? attempt.found(decodeValue(value))
          : attempt.unavailable(hash, `Key "${hash}" field "${field}" unavailable in database "${dbName}"`)
      },
      options,
    )
  }

  /** Hash `hash`. A missing hash is `unavailable`. */
  getAll(
    dbName: string,
    hash: string,
    options?: ExecuteOptions,
  ): Promise<ReadResult<Record<string, StoredValue>>> {
    return this.accessor.execute(
      dbName,
      "getAll",
      async (client) => {
        const raw = await client.hGetAll(hash)
        const entries = Object.entries(raw)

        return entries.length > 0
          ? attempt.found(Object.fromEntries(entries.map(([k, v]): [string, StoredValue] => [k, decodeValue(v)])))
          : attempt.unavailable(hash, `Key "${hash}" unavailable in database "${dbName}"`)
      },
      options,
    )
  }

  /** @returns the number of fields created. */
  set(dbName: string, hash: string, field: string, value: string, options?: ExecuteOptions): Promise<number> {
    return this.write(dbName, "set", (client) => client.hSet(hash, { [field]: value }), options)
  }

  /** @returns the number of keys removed. */
  delete(dbName: string, key: string, options?: ExecuteOptions): Promise<number> {
    return this.write(dbName, "delete", (client) => client.del(key), options)
  }

  /** @returns the number of keys removed. */
  deleteAllByPattern(dbName: string, pattern: string, options?: ExecuteOptions): Promise<number> {
    return this.write(
      dbName,
      "deleteAllByPattern",
      async (client) => {
        let removed = 0
        for (const key of await client.keys(pattern)) {
          removed += await client.del(key)
        }
        return removed
      },
      options,
    )
  }

  publish(dbName: string, channel: string, message: string): Promise<number> {
    return this.direct(dbName, "publish", (client) => client.publish(channel, message))
  }

  /** @returns whether a timeout was set (false when the key does not exist). */
  async expire(dbName: string, key: string, seconds: number): Promise<boolean> {
    return (await this.direct(dbName, "expire", (client) => client.expire(key, seconds))) === 1
  }

  async exists(dbName: string, key: string): Promise<boolean> {
    return (await this.direct(dbName, "exists", (client) => client.exists(key))) > 0
  }

  private async write<T>(
    dbName: string,
    operation: string,
    fn: (client: RedisClient) => Promise<T>,
    options?: ExecuteOptions,
  ): Promise<T> {
    const run: AttemptFn<T> = async (client) => attempt.found(await fn(client))
    const result = await this.accessor.execute(dbName, operation, run, options)

    return requireFound(result, `${operation} returned no result`, { dbName })
  }

  /** Single command, no retry. */
  private async direct<T>(dbName: string, operation: string, fn: (client: RedisClient) => Promise<T>): Promise<T> {
    const client = this.registry.get(dbName)

    try {
      return await fn(client)
    } catch (err) {
      throw classifyRedisError(err, { dbName, operation })
    }
  }
}
