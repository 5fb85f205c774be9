import { MissingClientError, OperationAbortedError, SchemaError } from "@switchconf/errors"
import { SocketClosedUnexpectedlyError } from "redis"
import { CONFIG_DB_ID, createTestConnector, testPolicy } from "../../../tests/utils/configdb-test-helpers"
import { type AttemptFn, attempt, BlockingAccessor } from "../blocking-accessor"

const HASH = "PORT|Ethernet0"

async function setup() {
  const harness = createTestConnector()
  await harness.connector.connect("CONFIG_DB")

  return { ...harness, accessor: harness.connector.accessor }
}

const alwaysUnavailable: AttemptFn<string> = async () => attempt.unavailable(HASH, `Key "${HASH}" unavailable`)

describe("BlockingAccessor", () => {
  it("returns found data at once", async () => {
    const { accessor, server, clock } = await setup()

    const result = await accessor.execute("CONFIG_DB", "read", async () => attempt.found("up"))

    expect(result).toStrictEqual({ kind: "found", value: "up" })
    expect(server.subscriberCount()).toBe(0)
    expect(clock.sleeps).toHaveLength(0)
  })

  it("returns unavailable without waiting when not blocking", async () => {
    const { accessor, server, clock } = await setup()

    const result = await accessor.execute("CONFIG_DB", "read", alwaysUnavailable)

    expect(result).toStrictEqual({ kind: "unavailable" })
    expect(server.subscriberCount()).toBe(0)
    expect(clock.nowMs()).toBe(0)
  })

  it("gives up a blocking read after the maximum data wait", async () => {
    const { accessor, server, clock } = await setup()
    const read = vi.fn(alwaysUnavailable)

    const result = await accessor.execute("CONFIG_DB", "read", read, { blocking: true })

    expect(result).toStrictEqual({ kind: "unavailable" })
    expect(clock.nowMs()).toBe(60_000)
    expect(clock.sleeps.map((s) => s.ms)).toStrictEqual([10_000, 10_000, 10_000, 10_000, 10_000, 10_000])
    expect(read).toHaveBeenCalledTimes(2)
    expect(server.subscriberCount()).toBe(0)
  })

  it("shortens the last notification wait to the remaining budget", async () => {
    const { connector, clock, logger } = await setup()
    const accessor = new BlockingAccessor(
      { registry: connector.registry, clock, logger },
      { ...testPolicy, maxDataWaitMs: 25_000 },
    )

    await accessor.execute("CONFIG_DB", "read", alwaysUnavailable, { blocking: true })

    expect(clock.sleeps.map((s) => s.ms)).toStrictEqual([10_000, 10_000, 5_000])
    expect(logger.withMessage("No notification received before timeout")[0]?.meta).toMatchObject({
      key: HASH,
      waitedMs: 25_000,
    })
  })

  it("retries after a matching notification and a settle delay", async () => {
    const { accessor, server, clock } = await setup()
    let calls = 0

    const result = await accessor.execute(
      "CONFIG_DB",
      "read",
      async (client) => {
        calls += 1
        const value = await client.hGet(HASH, "admin_status")
        if (value) return attempt.found(value)

        if (calls === 2) server.hSet(CONFIG_DB_ID, HASH, { admin_status: "up" })
        return attempt.unavailable(HASH, `Key "${HASH}" unavailable`)
      },
      { blocking: true },
    )

    expect(result).toStrictEqual({ kind: "found", value: "up" })
    expect(calls).toBe(3)
    expect(clock.sleeps.map((s) => s.ms)).toStrictEqual([testPolicy.settleDelayMs])
    expect(server.subscriberCount()).toBe(0)
  })

  it("finds data written between the first read and the subscription", async () => {
    const { accessor, server } = await setup()
    let calls = 0

    const result = await accessor.execute(
      "CONFIG_DB",
      "read",
      async (client) => {
        calls += 1
        const value = await client.hGet(HASH, "admin_status")
        if (value) return attempt.found(value)

        server.hSet(CONFIG_DB_ID, HASH, { admin_status: "down" })
        return attempt.unavailable(HASH, `Key "${HASH}" unavailable`)
      },
      { blocking: true },
    )

    expect(result).toStrictEqual({ kind: "found", value: "down" })
    expect(calls).toBe(2)
  })

  it("rethrows rejected commands as SchemaError", async () => {
    const { accessor, connector, logger } = await setup()
    await connector.client("CONFIG_DB").set("CONFIG_DB_INITIALIZED", "1")

    await expect(
      accessor.execute("CONFIG_DB", "read", async (client) => attempt.found(await client.hGetAll("CONFIG_DB_INITIALIZED"))),
    ).rejects.toBeInstanceOf(SchemaError)
    expect(logger.withMessage("Bad store request")).toHaveLength(1)
    expect(logger.withMessage("Bad store request")[0]?.level).toBe("error")
  })

  it("rethrows errors that are not connection failures", async () => {
    const { accessor } = await setup()

    await expect(accessor.execute("STATE_DB", "read", alwaysUnavailable)).rejects.toBeInstanceOf(MissingClientError)
  })

  it("reconnects after a connection failure and tries again", async () => {
    const { accessor, server, clock, logger } = await setup()
    server.hSet(CONFIG_DB_ID, HASH, { admin_status: "up" })
    server.failNextCommands(1)

    const result = await accessor.execute("CONFIG_DB", "read", async (client) =>
      attempt.found(await client.hGet(HASH, "admin_status")),
    )

    expect(result).toStrictEqual({ kind: "found", value: "up" })
    expect(server.connections).toBe(2)
    expect(clock.sleeps.map((s) => s.ms)).toStrictEqual([100])
    expect(logger.withMessage("Store access failed, reconnecting")).toMatchObject([
      { level: "warn", meta: { attempt: 1 } },
    ])
  })

  it("reconnects when subscribing to notifications fails and keeps waiting", async () => {
    const { accessor, server, clock, logger } = await setup()
    let calls = 0

    const result = await accessor.execute(
      "CONFIG_DB",
      "read",
      async (client) => {
        calls += 1
        const value = await client.hGet(HASH, "admin_status")
        if (value) return attempt.found(value)

        if (calls === 1) server.failNextCommands(1)
        if (calls === 2) server.hSet(CONFIG_DB_ID, HASH, { admin_status: "up" })
        return attempt.unavailable(HASH, `Key "${HASH}" unavailable`)
      },
      { blocking: true },
    )

    expect(result).toStrictEqual({ kind: "found", value: "up" })
    expect(calls).toBe(3)
    expect(clock.sleeps.map((s) => s.ms)).toStrictEqual([100])
    expect(logger.withMessage("Store access failed, reconnecting")).toMatchObject([
      { level: "warn", meta: { attempt: 1 } },
    ])
    expect(server.subscriberCount()).toBe(0)
    expect(server.openClients.size).toBe(1)
  })

  it("rethrows other attempt errors after a single call", async () => {
    const { accessor, server, clock } = await setup()
    const bug = new TypeError("Cannot read properties of undefined (reading 'split')")
    const read = vi.fn<AttemptFn<string>>(async () => {
      throw bug
    })

    await expect(accessor.execute("CONFIG_DB", "read", read, { blocking: true })).rejects.toBe(bug)
    expect(read).toHaveBeenCalledTimes(1)
    expect(server.connections).toBe(1)
    expect(clock.sleeps).toHaveLength(0)
  })

  it("logs consecutive failures as errors only between the thresholds", async () => {
    const { accessor, logger } = await setup()
    let calls = 0

    await accessor.execute("CONFIG_DB", "read", async () => {
      calls += 1
      if (calls <= 5) throw new SocketClosedUnexpectedlyError()
      return attempt.found(calls)
    })

    expect(logger.withMessage("Store access failed, reconnecting").map((e) => e.level)).toStrictEqual([
      "warn",
      "warn",
      "error",
      "warn",
      "warn",
    ])
  })

  it("throws OperationAbortedError when aborted before the first attempt", async () => {
    const { accessor } = await setup()
    const controller = new AbortController()
    controller.abort()
    const read = vi.fn(alwaysUnavailable)

    await expect(
      accessor.execute("CONFIG_DB", "read", read, { blocking: true, signal: controller.signal }),
    ).rejects.toBeInstanceOf(OperationAbortedError)
    expect(read).not.toHaveBeenCalled()
  })

  it("throws OperationAbortedError when aborted while waiting for data", async () => {
    const { accessor } = await setup()
    const controller = new AbortController()
    let calls = 0

    const pending = accessor.execute(
      "CONFIG_DB",
      "read",
      async () => {
        calls += 1
        if (calls === 2) controller.abort()
        return attempt.unavailable(HASH, `Key "${HASH}" unavailable`)
      },
      { blocking: true, signal: controller.signal },
    )

    await expect(pending).rejects.toBeInstanceOf(OperationAbortedError)
  })

  it("throws OperationAbortedError when aborted while reconnecting", async () => {
    const { accessor, connector } = await setup()
    const controller = new AbortController()

    const pending = accessor.execute(
      "CONFIG_DB",
      "read",
      async () => {
        controller.abort()
        throw new SocketClosedUnexpectedlyError()
      },
      { signal: controller.signal },
    )

    await expect(pending).rejects.toBeInstanceOf(OperationAbortedError)
    expect(connector.registry.has("CONFIG_DB")).toBe(false)
  })
})
