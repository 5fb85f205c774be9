import { type ZodType, z } from "zod"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  sources: readonly ConfigSource[]
}

/**
 * Merge `sources` left to right and validate the result against `schema`.
 *
 * @throws ConfigError `config_invalid` when validation fails. Read failures
 * from a source propagate as thrown by the source.
 */
export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance = new Map<string, string>()

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue
      merged[key] = value
      provenance.set(key, source.name)
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw new ConfigError(
      "config_invalid",
      `Configuration validation failed:\n${z.prettifyError(result.error)}`,
      { source: sources.map((s) => s.name).join(","), cause: result.error },
    )
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}
