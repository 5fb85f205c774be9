import { type LoadConnectorConfigOptions, loadConnectorConfig } from "../../config/connector-config"
import { DatabaseCatalog } from "../../config/database-catalog"
import { ConfigDbConnector, type ConfigDbConnectorOptions } from "./config-db-connector"
import { DbConnector, type DbConnectorDeps } from "./db-connector"

export type CreateConfigDbConnectorOptions = LoadConnectorConfigOptions &
  Omit<ConfigDbConnectorOptions, "scanBatchSize"> & {
    /** Replace the store client, clock or logger built from the settings. */
    deps?: Partial<Omit<DbConnectorDeps, "catalog">>
  }

/**
 * Build a {@link ConfigDbConnector} from `.env`, `SWITCHCONF_*` variables and
 * the database catalog they point at (the bundled one by default). The
 * connector is returned unconnected.
 */
export async function createConfigDbConnector(
  options: CreateConfigDbConnectorOptions = {},
): Promise<ConfigDbConnector> {
  const { deps, dbName, strategy, ...loadOptions } = options

  const config = await loadConnectorConfig(loadOptions)
  const catalog = await DatabaseCatalog.load(config.databaseConfigFile, loadOptions.cwd)
  const connector = DbConnector.fromConfig(config, catalog, deps)

  return new ConfigDbConnector(connector, {
    scanBatchSize: config.scanBatchSize,
    ...(dbName !== undefined && { dbName }),
    ...(strategy !== undefined && { strategy }),
  })
}
