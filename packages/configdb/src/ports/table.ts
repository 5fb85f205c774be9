/** Scalar key, or the ordered parts of a multi-part key. */
export type RowKey = string | readonly string[]

export type FieldValue = string | readonly string[]

/** Decoded row: field name to scalar or list. */
export type Row = Readonly<Record<string, FieldValue>>

/** What callers may write. Numbers and booleans are stored in their string form. */
export type RowInput = Readonly<Record<string, FieldValue | number | boolean>>

/** A store hash, field name to string. */
export type RawRow = Record<string, string>

export type TableEntry = {
  readonly key: RowKey
  readonly row: Row
}

/** Rows of one table, keyed by serialized row key. */
export type TableData = Map<string, TableEntry>

/** Tables keyed by table name. */
export type ConfigData = Map<string, TableData>

/** Rows to write; a `null` row deletes the entry. */
export type TableUpdate = Iterable<readonly [RowKey, RowInput | null]>

/** Tables to write; a `null` table is deleted as a whole. */
export type ConfigUpdate = Readonly<Record<string, TableUpdate | null>>
