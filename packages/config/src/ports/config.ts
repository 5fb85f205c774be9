/**
 * Validated configuration with provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ REDIS_PORT: z.coerce.number().default(6379) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource({ prefix: "SWITCHCONF_" })],
 * })
 *
 * config.get("REDIS_PORT") // 6379
 * config.explain("REDIS_PORT") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  /** Name of the source that supplied `key`, or `"default"` when the schema did. */
  explain<K extends keyof T & string>(key: K): string

  /** Sources that supplied at least one value, in application order. */
  sourcesUsed(): string[]

  /** Keys some source supplied that the schema does not know. Catches typos. */
  unknownKeys(): string[]
}
