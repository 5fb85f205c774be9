/**
 * Where raw configuration comes from.
 *
 * A source only loads values. Coercion and validation happen once, after all
 * sources are merged; later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. `env`, `dotenv:.env`, `json:database-config.json`. */
  readonly name: string

  /**
   * Flat sources (env, dotenv) yield strings; JSON may nest. An `undefined`
   * value means "not provided".
   */
  load(): Promise<Record<string, unknown>>
}
