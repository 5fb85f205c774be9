import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only variables starting with `prefix` are read, with the prefix stripped. */
  prefix?: string
  env?: NodeJS.ProcessEnv
}

export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: NodeJS.ProcessEnv

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
    this.name = this.prefix ? `env:${this.prefix}*` : "env"
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (value === undefined || !key.startsWith(this.prefix)) continue
      values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
