import type { RowKey, Row } from "./table"

export type ChangeKind = "set" | "deleted"

/**
 * Called with the current value of a changed row. A deleted row arrives as
 * `{}` with kind `"deleted"`.
 */
export type ChangeHandler = (table: string, key: RowKey, row: Row, kind: ChangeKind) => void | Promise<void>
