import type { FieldValue, RawRow, Row, RowInput } from "../../ports/table"

/** Field (and value) that marks an existing row with no fields. */
export const EMPTY_ROW_SENTINEL = "NULL"

const LIST_SUFFIX = "@"
const LIST_DELIMITER = ","

function isList(value: unknown): value is readonly string[] {
  return Array.isArray(value)
}

/** Name under which `field` is stored, given its value. */
export function storedFieldName(field: string, value: FieldValue | number | boolean): string {
  return isList(value) ? `${field}${LIST_SUFFIX}` : field
}

/**
 * Encode a row as a store hash.
 *
 * List fields are stored as `field@` with comma-joined values. An empty row
 * becomes `{ NULL: "NULL" }` so that it still exists on the store.
 *
 * @remarks
 * Lossless only when no field name ends in `@` and no list element contains a
 * comma. Neither is checked.
 */
export function rowToRaw(row: RowInput): RawRow {
  const raw: RawRow = {}

  for (const [field, value] of Object.entries(row)) {
    if (isList(value)) {
      raw[`${field}${LIST_SUFFIX}`] = value.join(LIST_DELIMITER)
    } else {
      raw[field] = String(value)
    }
  }

  if (Object.keys(raw).length === 0) {
    raw[EMPTY_ROW_SENTINEL] = EMPTY_ROW_SENTINEL
  }

  return raw
}

/** Decode a store hash. Inverse of {@link rowToRaw}. */
export function rawToTyped(raw: Readonly<RawRow>): Row {
  const row: Record<string, FieldValue> = {}

  for (const [field, value] of Object.entries(raw)) {
    if (field === EMPTY_ROW_SENTINEL) continue

    if (field.endsWith(LIST_SUFFIX)) {
      row[field.slice(0, -LIST_SUFFIX.length)] = value.split(LIST_DELIMITER)
    } else {
      row[field] = value
    }
  }

  return row
}
