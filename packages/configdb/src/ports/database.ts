/** A logical database on the store. */
export type DatabaseInfo = {
  /** Logical name, e.g. `CONFIG_DB`. */
  readonly name: string
  /** Numeric database index on the store. */
  readonly id: number
  /** Joins table names and key parts. */
  readonly separator: string
}
