import { keyspacePattern, parseKeyspaceEvent } from "../keyspace-event"

describe("parseKeyspaceEvent", () => {
  it("takes the key from a keyspace channel", () => {
    expect(parseKeyspaceEvent("__keyspace@4__:PORT|Ethernet0", "hset")).toStrictEqual({
      channel: "__keyspace@4__:PORT|Ethernet0",
      message: "hset",
      key: "PORT|Ethernet0",
    })
  })

  it("keeps colons inside the key", () => {
    expect(parseKeyspaceEvent("__keyspace@0__:ROUTE_TABLE:10.1.0.0/16", "del").key).toBe("ROUTE_TABLE:10.1.0.0/16")
  })

  it("takes the event name from a keyevent channel", () => {
    expect(parseKeyspaceEvent("__keyevent@4__:hset", "PORT|Ethernet0").key).toBe("hset")
  })
})

describe("keyspacePattern", () => {
  it("matches every key of a database by default", () => {
    expect(keyspacePattern(4)).toBe("__keyspace@4__:*")
  })

  it("matches a single key", () => {
    expect(keyspacePattern(4, "CONFIG_DB_INITIALIZED")).toBe("__keyspace@4__:CONFIG_DB_INITIALIZED")
  })
})
