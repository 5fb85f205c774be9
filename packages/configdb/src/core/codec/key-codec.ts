import type { RowKey } from "../../ports/table"

export type HashKeyParts = {
  table: string
  /** Serialized row key, as stored. */
  rawKey: string
  key: RowKey
}

/**
 * Maps row keys to store keys for one database's separator.
 *
 * A store key looks like `TABLE<sep>part1<sep>part2`. Key parts must not
 * contain the separator: `["a|b"]` and `["a", "b"]` serialize alike.
 */
export class KeyCodec {
  constructor(readonly separator: string) {}

  serialize(key: RowKey): string {
    return typeof key === "string" ? key : key.join(this.separator)
  }

  /** A single part comes back as a scalar, several as a tuple. */
  deserialize(raw: string): RowKey {
    const parts = raw.split(this.separator)

    return parts.length > 1 ? parts : raw
  }

  hashKey(table: string, key: RowKey): string {
    return `${table.toUpperCase()}${this.separator}${this.serialize(key)}`
  }

  /** Glob matching every row of `table`. */
  tablePattern(table: string): string {
    return `${table.toUpperCase()}${this.separator}*`
  }

  /**
   * Split a store key at its first separator.
   *
   * @returns `undefined` for keys that do not belong to any table.
   */
  split(hashKey: string): HashKeyParts | undefined {
    const at = hashKey.indexOf(this.separator)
    if (at < 0) return undefined

    const rawKey = hashKey.slice(at + this.separator.length)

    return { table: hashKey.slice(0, at), rawKey, key: this.deserialize(rawKey) }
  }
}
