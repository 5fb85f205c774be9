import { DotenvSource, EnvSource, loadConfig, ObjectSource } from "@switchconf/config"
import { type LoggerOptions, logLevelNames } from "@switchconf/logger"
import { z } from "zod"
import type { RedisConnectionParams } from "../adapters/redis/create-redis-client"
import type { BlockingPolicy } from "../core/blocking/blocking-policy"
import { constantDelay } from "../core/blocking/delay-policy"

export const ENV_PREFIX = "SWITCHCONF_"

const milliseconds = z.coerce.number().int().nonnegative()
const flag = z.union([z.boolean(), z.stringbool()])

export const connectorSettingsSchema = z.object({
  REDIS_HOST: z.string().min(1).default("127.0.0.1"),
  REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  REDIS_UNIX_SOCKET_PATH: z.string().min(1).optional(),
  DATABASE_CONFIG_FILE: z.string().min(1).optional(),

  CONNECT_RETRY_WAIT_MS: milliseconds.default(10_000),
  DATA_RETRIEVAL_WAIT_MS: milliseconds.default(3_000),
  PUBSUB_NOTIFICATION_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  PUBSUB_MAXIMUM_DATA_WAIT_MS: milliseconds.default(60_000),
  BLOCKING_ERROR_THRESHOLD: z.coerce.number().int().nonnegative().default(10),
  BLOCKING_SUPPRESSION_THRESHOLD: z.coerce.number().int().nonnegative().default(15),

  SCAN_BATCH_SIZE: z.coerce.number().int().positive().default(30),
  KEYSPACE_EVENTS: z.string().min(1).default("KEA"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),
})

export type ConnectorSettings = z.infer<typeof connectorSettingsSchema>

export type ConnectorConfig = {
  redis: RedisConnectionParams
  /** Database catalog to use instead of the bundled one. */
  databaseConfigFile: string | undefined
  blocking: BlockingPolicy
  scanBatchSize: number
  keyspaceEvents: string
  log: LoggerOptions
}

export function toConnectorConfig(settings: ConnectorSettings): ConnectorConfig {
  return {
    redis: {
      host: settings.REDIS_HOST,
      port: settings.REDIS_PORT,
      unixSocketPath: settings.REDIS_UNIX_SOCKET_PATH,
    },
    databaseConfigFile: settings.DATABASE_CONFIG_FILE,
    blocking: {
      reconnectDelay: constantDelay({ milliseconds: settings.CONNECT_RETRY_WAIT_MS }),
      notificationTimeoutMs: settings.PUBSUB_NOTIFICATION_TIMEOUT_MS,
      maxDataWaitMs: settings.PUBSUB_MAXIMUM_DATA_WAIT_MS,
      settleDelayMs: settings.DATA_RETRIEVAL_WAIT_MS,
      errorThreshold: settings.BLOCKING_ERROR_THRESHOLD,
      suppressionThreshold: settings.BLOCKING_SUPPRESSION_THRESHOLD,
    },
    scanBatchSize: settings.SCAN_BATCH_SIZE,
    keyspaceEvents: settings.KEYSPACE_EVENTS,
    log: { level: settings.LOG_LEVEL, prettify: settings.LOG_PRETTY },
  }
}

export type LoadConnectorConfigOptions = {
  /** Default: `process.env` */
  env?: NodeJS.ProcessEnv
  /** Optional dotenv file read before the environment. Default: `.env` */
  dotenvFile?: string
  cwd?: string
  /** Applied last, unprefixed keys. */
  overrides?: Readonly<Record<string, unknown>>
}

/**
 * Connector settings from `.env`, then `SWITCHCONF_*` variables, then
 * `overrides`, each overriding the previous.
 */
export async function loadConnectorConfig(options: LoadConnectorConfigOptions = {}): Promise<ConnectorConfig> {
  const config = await loadConfig({
    schema: connectorSettingsSchema,
    sources: [
      new DotenvSource({
        file: options.dotenvFile ?? ".env",
        required: options.dotenvFile !== undefined,
        prefix: ENV_PREFIX,
        ...(options.cwd !== undefined && { cwd: options.cwd }),
      }),
      new EnvSource({ prefix: ENV_PREFIX, ...(options.env && { env: options.env }) }),
      new ObjectSource(options.overrides ?? {}),
    ],
  })

  return toConnectorConfig(config.value)
}
