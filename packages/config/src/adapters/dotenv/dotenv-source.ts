import { parse } from "dotenv"
import type { ConfigSource } from "../../ports/source"
import { readConfigFile } from "../read-file"

export type DotenvSourceOptions = {
  /** Absolute, or relative to `cwd`. */
  file: string
  /** When false a missing file yields no values. */
  required: boolean
  /** @default process.cwd() */
  cwd?: string
  /** Only keys starting with `prefix` are kept, with the prefix stripped. */
  prefix?: string
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readConfigFile(this.name, this.opts.file, this.opts.required, this.opts.cwd)
    if (content === undefined) return {}

    const prefix = this.opts.prefix ?? ""
    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(parse(content))) {
      if (key.startsWith(prefix)) values[key.slice(prefix.length)] = value
    }

    return values
  }
}
