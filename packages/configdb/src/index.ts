export { classifyRedisError, isTransportError } from "./adapters/redis/classify-redis-error"
export { createRedisClientFactory, type RedisConnectionParams } from "./adapters/redis/create-redis-client"
export {
  type ConnectorConfig,
  type ConnectorSettings,
  connectorSettingsSchema,
  ENV_PREFIX,
  type LoadConnectorConfigOptions,
  loadConnectorConfig,
  toConnectorConfig,
} from "./config/connector-config"
export {
  bundledCatalogFile,
  DatabaseCatalog,
  type DatabaseCatalogDocument,
  databaseCatalogSchema,
} from "./config/database-catalog"
export {
  type AttemptFn,
  type AttemptOutcome,
  attempt,
  BlockingAccessor,
  type ExecuteOptions,
} from "./core/blocking/blocking-accessor"
export { type BlockingPolicy, defaultBlockingPolicy } from "./core/blocking/blocking-policy"
export { constantDelay, type Delay, type DelayPolicy, exponentialDelay } from "./core/blocking/delay-policy"
export { KeyCodec } from "./core/codec/key-codec"
export { EMPTY_ROW_SENTINEL, rawToTyped, rowToRaw } from "./core/codec/type-codec"
export {
  type ConfigDbConnectOptions,
  ConfigDbConnector,
  type ConfigDbConnectorOptions,
  type TableStrategy,
} from "./core/connector/config-db-connector"
export {
  type CreateConfigDbConnectorOptions,
  createConfigDbConnector,
} from "./core/connector/create-config-db-connector"
export { DbConnector, type DbConnectorDeps, type DbConnectorOptions, type StoredValue } from "./core/connector/db-connector"
export { requireFound } from "./core/connector/require-found"
export { ChangeNotifier, type ChangeNotifierDeps } from "./core/notify/change-notifier"
export { HandlerRegistry } from "./core/notify/handler-registry"
export { type KeyspaceEvent, keyspacePattern } from "./core/notify/keyspace-event"
export { ConnectionRegistry, type ConnectOptions } from "./core/registry/connection-registry"
export { KeyspaceNotificationChannel } from "./core/registry/notification-channel"
export { INIT_INDICATOR } from "./core/table/init-indicator"
export { PerKeyTableStore } from "./core/table/per-key-table-store"
export { PipelinedTableStore } from "./core/table/pipelined-table-store"
export type { ChangeHandler, ChangeKind } from "./ports/change-handler"
export type { DatabaseInfo } from "./ports/database"
export type { ReadResult } from "./ports/read-result"
export type { RedisClient, RedisClientFactory, RedisMulti } from "./ports/redis-client"
export type {
  ConfigData,
  ConfigUpdate,
  FieldValue,
  RawRow,
  Row,
  RowInput,
  RowKey,
  TableData,
  TableEntry,
  TableUpdate,
} from "./ports/table"
export type { TableStore } from "./ports/table-store"
