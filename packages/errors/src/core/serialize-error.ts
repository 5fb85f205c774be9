import type { AppError, SerializedError } from "../ports/error"

export type SerializeOptions = Readonly<{
  /** Default: false */
  includeStack?: boolean
}>

function isAppError(err: Error): err is AppError {
  return "code" in err && typeof err.code === "string" && "timestamp" in err && err.timestamp instanceof Date
}

/**
 * Serialize any thrown value, following `cause` recursively.
 *
 * @remarks
 * Driver errors (plain `Error`) are reported with code `"unknown"` and
 * `isOperational: false`; values that are not errors at all end up under
 * `context.value`.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof Error) {
    const app = isAppError(err) ? err : undefined

    return {
      name: err.name,
      code: app?.code ?? "unknown",
      message: err.message,
      context: app ? { ...app.context } : {},
      timestamp: (app?.timestamp ?? new Date()).toISOString(),
      isRetryable: app?.isRetryable ?? false,
      isOperational: app?.isOperational ?? false,
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(includeStack && err.stack !== undefined && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    timestamp: new Date().toISOString(),
    isRetryable: false,
    isOperational: false,
  }
}
