import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { ConfigError } from "@switchconf/config"
import { loadConnectorConfig } from "../connector-config"

describe("loadConnectorConfig", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "switchconf-connector-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("applies defaults", async () => {
    const config = await loadConnectorConfig({ env: {}, cwd })

    expect(config.redis).toStrictEqual({ host: "127.0.0.1", port: 6379, unixSocketPath: undefined })
    expect(config.databaseConfigFile).toBeUndefined()
    expect(config.blocking).toMatchObject({
      notificationTimeoutMs: 10_000,
      maxDataWaitMs: 60_000,
      settleDelayMs: 3_000,
      errorThreshold: 10,
      suppressionThreshold: 15,
    })
    expect(config.blocking.reconnectDelay.getDelay(1)).toStrictEqual({ milliseconds: 10_000 })
    expect(config.scanBatchSize).toBe(30)
    expect(config.keyspaceEvents).toBe("KEA")
    expect(config.log).toStrictEqual({ level: "info", prettify: false })
  })

  it("reads prefixed environment variables", async () => {
    const config = await loadConnectorConfig({
      cwd,
      env: {
        SWITCHCONF_REDIS_UNIX_SOCKET_PATH: "/var/run/redis/redis.sock",
        SWITCHCONF_CONNECT_RETRY_WAIT_MS: "250",
        SWITCHCONF_LOG_LEVEL: "debug",
        SWITCHCONF_LOG_PRETTY: "true",
        REDIS_PORT: "1",
      },
    })

    expect(config.redis).toStrictEqual({
      host: "127.0.0.1",
      port: 6379,
      unixSocketPath: "/var/run/redis/redis.sock",
    })
    expect(config.blocking.reconnectDelay.getDelay(3)).toStrictEqual({ milliseconds: 250 })
    expect(config.log).toStrictEqual({ level: "debug", prettify: true })
  })

  it("lets the environment override the dotenv file and overrides win last", async () => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "SWITCHCONF_SCAN_BATCH_SIZE=50\nSWITCHCONF_REDIS_HOST=10.0.0.1\nSWITCHCONF_KEYSPACE_EVENTS=Kh\n",
    )

    const config = await loadConnectorConfig({
      cwd,
      env: { SWITCHCONF_SCAN_BATCH_SIZE: "70", SWITCHCONF_KEYSPACE_EVENTS: "Kg" },
      overrides: { KEYSPACE_EVENTS: "KEA" },
    })

    expect(config.scanBatchSize).toBe(70)
    expect(config.redis.host).toBe("10.0.0.1")
    expect(config.keyspaceEvents).toBe("KEA")
  })

  it("requires an explicitly named dotenv file", async () => {
    await expect(loadConnectorConfig({ cwd, env: {}, dotenvFile: "connector.env" })).rejects.toMatchObject({
      code: "config_unreadable",
    })
  })

  it("rejects invalid values", async () => {
    const load = loadConnectorConfig({ cwd, env: { SWITCHCONF_REDIS_PORT: "not-a-port" } })

    await expect(load).rejects.toBeInstanceOf(ConfigError)
    await expect(load).rejects.toMatchObject({ code: "config_invalid" })
  })

  it("rejects an unknown log level", async () => {
    await expect(loadConnectorConfig({ cwd, env: { SWITCHCONF_LOG_LEVEL: "verbose" } })).rejects.toMatchObject({
      code: "config_invalid",
    })
  })
})
