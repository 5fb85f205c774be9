import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { JsonSource } from "../json-source"

describeConfigSourceContract({
  name: "JsonSource",
  setup: (cwd) =>
    fs.writeFile(
      path.join(cwd, "db.json"),
      JSON.stringify({ DATABASES: { CONFIG_DB: { id: 4, separator: "|" } }, VERSION: "1.0" }),
    ),
  make: (cwd) => new JsonSource({ file: "db.json", required: true, cwd }),
  expected: { DATABASES: { CONFIG_DB: { id: 4, separator: "|" } }, VERSION: "1.0" },
})

describe("JsonSource", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "switchconf-json-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("rejects malformed JSON", async () => {
    await fs.writeFile(path.join(cwd, "bad.json"), "{ nope")

    await expect(new JsonSource({ file: "bad.json", required: true, cwd }).load()).rejects.toMatchObject({
      code: "config_unreadable",
      message: "bad.json is not valid JSON",
    })
  })

  it("rejects a top-level array", async () => {
    await fs.writeFile(path.join(cwd, "list.json"), "[1, 2]")

    await expect(new JsonSource({ file: "list.json", required: true, cwd }).load()).rejects.toMatchObject({
      message: "list.json must hold a JSON object",
    })
  })

  it("yields nothing for a missing optional file", async () => {
    expect(await new JsonSource({ file: "none.json", required: false, cwd }).load()).toEqual({})
  })
})
