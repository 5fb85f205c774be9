import type { RawRow } from "./table"

export type RedisScanOptions = {
  MATCH: string
  COUNT: number
}

export type RedisScanReply = {
  cursor: string
  keys: string[]
}

/** Commands queued on a pipeline. Replies come back from `exec()` in order. */
export interface RedisMulti {
  hGetAll(key: string): unknown
  hSet(key: string, value: RawRow): unknown
  hDel(key: string, fields: string | string[]): unknown
  del(keys: string | string[]): unknown
  exec(): Promise<unknown[]>
}

export type PatternListener = (message: string, channel: string) => void

/**
 * The subset of the node-redis client this package talks to, with string
 * replies.
 */
export interface RedisClient {
  readonly isOpen: boolean

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  /** Drop the connection without waiting for pending replies. */
  disconnect(): Promise<unknown>
  on(event: "error", listener: (err: Error) => void): unknown
  duplicate(): RedisClient

  configSet(parameter: string, value: string): Promise<unknown>

  keys(pattern: string): Promise<string[]>
  scan(cursor: string, options: RedisScanOptions): Promise<RedisScanReply>
  exists(key: string): Promise<number>
  expire(key: string, seconds: number): Promise<number>
  del(keys: string | string[]): Promise<number>

  get(key: string): Promise<string | null>
  set(key: string, value: string): Promise<unknown>

  hGet(key: string, field: string): Promise<string | null>
  hGetAll(key: string): Promise<RawRow>
  hSet(key: string, value: RawRow): Promise<number>
  hDel(key: string, fields: string | string[]): Promise<number>

  publish(channel: string, message: string): Promise<number>
  pSubscribe(pattern: string, listener: PatternListener): Promise<unknown>
  pUnsubscribe(pattern?: string): Promise<unknown>

  multi(): RedisMulti
}

export type RedisClientFactory = (dbId: number) => RedisClient
