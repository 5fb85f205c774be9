import type { ConfigSource } from "../../ports/source"
import { ConfigError } from "../../core/config-error"
import { readConfigFile } from "../read-file"

export type JsonSourceOptions = {
  /** Absolute, or relative to `cwd`. */
  file: string
  /** When false a missing file yields no values. */
  required: boolean
  /** @default process.cwd() */
  cwd?: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readConfigFile(this.name, this.opts.file, this.opts.required, this.opts.cwd)
    if (content === undefined) return {}

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (err) {
      throw new ConfigError("config_unreadable", `${this.opts.file} is not valid JSON`, {
        source: this.name,
        cause: err,
      })
    }

    if (!isRecord(parsed)) {
      throw new ConfigError("config_unreadable", `${this.opts.file} must hold a JSON object`, {
        source: this.name,
      })
    }

    return parsed
  }
}
