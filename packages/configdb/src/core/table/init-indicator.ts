/** String key set once the configuration database is fully loaded. */
export const INIT_INDICATOR = "CONFIG_DB_INITIALIZED"
