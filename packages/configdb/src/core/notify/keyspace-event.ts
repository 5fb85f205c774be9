/**
 * One pattern-subscription message.
 *
 * On a keyspace channel (`__keyspace@4__:PORT|Ethernet0`) the message is the
 * command (`hset`, `del`, ...). On a keyevent channel (`__keyevent@4__:hset`)
 * it is the key.
 */
export type KeyspaceEvent = {
  readonly channel: string
  readonly message: string
  /** Text after the first `:` of the channel name. */
  readonly key: string
}

export function parseKeyspaceEvent(channel: string, message: string): KeyspaceEvent {
  const at = channel.indexOf(":")

  return { channel, message, key: at < 0 ? "" : channel.slice(at + 1) }
}

/** Pattern matching every keyspace and keyevent channel of every database. */
export const ANY_KEYSPACE_PATTERN = "__key*__:*"

export function keyspacePattern(dbId: number, key: string = "*"): string {
  return `__keyspace@${dbId}__:${key}`
}
