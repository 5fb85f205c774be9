import { createClient } from "redis"
import type { RedisClient, RedisClientFactory } from "../../ports/redis-client"

export type RedisConnectionParams = {
  host: string
  port: number
  /** When set, connect over this unix socket instead of TCP. */
  unixSocketPath?: string | undefined
}

/**
 * Client factory bound to one store instance; each call selects a database.
 *
 * @remarks
 * The driver's own reconnect is off. Recovery belongs to the connection
 * registry and the blocking accessor, which close and reopen clients.
 */
export function createRedisClientFactory(params: RedisConnectionParams): RedisClientFactory {
  return (dbId) => {
    const socket = params.unixSocketPath
      ? { path: params.unixSocketPath, reconnectStrategy: false as const }
      : { host: params.host, port: params.port, reconnectStrategy: false as const }

    return createClient({ socket, database: dbId }) as unknown as RedisClient
  }
}
