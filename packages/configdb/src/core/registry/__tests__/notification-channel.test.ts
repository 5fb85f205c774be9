import { FakeClock } from "@switchconf/clock"
import { FakeRedisServer } from "../../../tests/utils/fake-redis"
import { KeyspaceNotificationChannel } from "../notification-channel"

async function setup(pattern: string = "__keyspace@4__:*") {
  const server = new FakeRedisServer()
  const clock = new FakeClock()
  const channel = await KeyspaceNotificationChannel.open(server.client(4), pattern, clock)

  return { server, clock, channel }
}

describe("KeyspaceNotificationChannel", () => {
  it("subscribes on a dedicated connection", async () => {
    const { server, channel } = await setup()

    expect(server.connections).toBe(1)
    expect(server.subscriberCount()).toBe(1)
    expect(channel.pattern).toBe("__keyspace@4__:*")
  })

  it("buffers messages until they are consumed", async () => {
    const { server, channel } = await setup()

    server.publish("__keyspace@4__:PORT|Ethernet0", "hset")
    server.publish("__keyspace@4__:PORT|Ethernet4", "del")

    expect(channel.pending).toBe(2)
    expect(await channel.nextEvent(1_000)).toStrictEqual({
      channel: "__keyspace@4__:PORT|Ethernet0",
      message: "hset",
      key: "PORT|Ethernet0",
    })
    expect((await channel.nextEvent(1_000))?.message).toBe("del")
    expect(channel.pending).toBe(0)
  })

  it("ignores channels outside its pattern", async () => {
    const { server, channel } = await setup()

    server.publish("__keyspace@6__:PORT|Ethernet0", "hset")

    expect(channel.pending).toBe(0)
  })

  it("returns null once the timeout passes", async () => {
    const { clock, channel } = await setup()

    expect(await channel.nextEvent(500)).toBeNull()
    expect(clock.sleeps).toStrictEqual([{ ms: 500, at: 0 }])
  })

  it("hands a message straight to a waiting consumer", async () => {
    const { server, channel } = await setup()
    const events = channel.events()

    const next = events.next()
    server.publish("__keyspace@4__:VLAN|Vlan100", "hset")

    expect(await next).toStrictEqual({
      done: false,
      value: { channel: "__keyspace@4__:VLAN|Vlan100", message: "hset", key: "VLAN|Vlan100" },
    })
    expect(channel.pending).toBe(0)
  })

  it("close wakes waiting consumers and unsubscribes", async () => {
    const { server, channel } = await setup()
    const next = channel.events().next()

    await channel.close()

    expect(await next).toStrictEqual({ done: true, value: undefined })
    expect(channel.isClosed).toBe(true)
    expect(server.subscriberCount()).toBe(0)
  })

  it("close is idempotent", async () => {
    const { channel } = await setup()

    await channel.close()
    await channel.close()

    expect(await channel.nextEvent(1_000)).toBeNull()
  })

  it("events() ends when the signal aborts", async () => {
    const { channel } = await setup()
    const controller = new AbortController()
    const next = channel.events(controller.signal).next()

    controller.abort()

    expect(await next).toStrictEqual({ done: true, value: undefined })
    expect(channel.isClosed).toBe(false)
  })
})
