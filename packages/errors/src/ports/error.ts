export type ErrorCode = Lowercase<string>

/** Codes raised by the store access layer. */
export type StoreErrorCode =
  | "connection_error"
  | "schema_error"
  | "unavailable_data"
  | "missing_client"
  | "operation_aborted"

/**
 * Structured metadata attached to errors: database name, table, key and the
 * like, instead of string munging in the message.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` if repeating the same operation might succeed. */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`) versus programmer error (`false`).
   *
   * @remarks
   * A transport failure is operational. Addressing a database that was never
   * connected is not: retrying cannot fix it.
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/** JSON-safe error shape for logs. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
