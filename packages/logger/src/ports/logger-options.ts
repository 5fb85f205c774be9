import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output through `pino-pretty`. Meant for local runs; leave
   * off where logs are shipped as JSON.
   */
  prettify?: boolean
}
