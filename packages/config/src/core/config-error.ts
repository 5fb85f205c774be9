import { BaseError } from "@switchconf/errors"

type ConfigErrorCode = "config_invalid" | "config_unreadable"

/** Configuration could not be read or did not validate. Never retryable. */
export class ConfigError extends BaseError<ConfigErrorCode> {
  constructor(code: ConfigErrorCode, message: string, options: { source?: string; cause?: unknown } = {}) {
    super(message, {
      code,
      context: options.source === undefined ? {} : { source: options.source },
      cause: options.cause,
      isOperational: true,
    })
  }
}
