import type { ConfigData, ConfigUpdate, RowInput, Row, RowKey, TableData } from "./table"

/**
 * Table-level access to one database.
 *
 * Table names are upper-cased on write. Store keys without a separator do
 * not belong to any table and are skipped by every enumeration.
 */
export interface TableStore {
  /** Current row, or `{}` when the entry does not exist. */
  getEntry(table: string, key: RowKey): Promise<Row>

  /**
   * Replace the row: fields missing from `row` are removed. `null` deletes
   * the entry.
   *
   * @remarks
   * Read, write, then delete stale fields: not atomic. A concurrent writer's
   * new field can be removed.
   */
  setEntry(table: string, key: RowKey, row: RowInput | null): Promise<void>

  /** Upsert the given fields, keeping the others. `null` deletes the entry. */
  modEntry(table: string, key: RowKey, row: RowInput | null): Promise<void>

  getTable(table: string): Promise<TableData>
  deleteTable(table: string): Promise<void>

  /**
   * Row keys of `table`. With `split` off, whole store keys are deserialized
   * instead, so the table name comes back as the first key part.
   */
  getKeys(table: string, split?: boolean): Promise<RowKey[]>

  getConfig(): Promise<ConfigData>

  /** Upsert every row of every table; a `null` table is deleted first. */
  modConfig(update: ConfigUpdate): Promise<void>
}
