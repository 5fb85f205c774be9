import type { ErrorContext, StoreErrorCode } from "../ports/error"
import { BaseError } from "./base-error"

type StoreErrorOptions = Readonly<{
  context?: ErrorContext
  cause?: unknown
}>

/** Transport or network failure talking to the store. Retried by the blocking accessor. */
export class ConnectionError extends BaseError<"connection_error"> {
  constructor(message: string, options: StoreErrorOptions = {}) {
    super(message, { ...options, code: "connection_error", isRetryable: true })
  }
}

/** The store rejected the command itself (e.g. `WRONGTYPE`). Never retried. */
export class SchemaError extends BaseError<"schema_error"> {
  constructor(message: string, options: StoreErrorOptions = {}) {
    super(message, { ...options, code: "schema_error" })
  }
}

/**
 * Requested data is absent.
 *
 * Ordinary reads report absence as a result value; only the `require*`
 * helpers throw this.
 */
export class UnavailableDataError extends BaseError<"unavailable_data"> {
  constructor(message: string, options: StoreErrorOptions = {}) {
    super(message, { ...options, code: "unavailable_data", isRetryable: true })
  }
}

export class MissingClientError extends BaseError<"missing_client"> {
  constructor(dbName: string) {
    super(`No connection registered for database "${dbName}"`, {
      code: "missing_client",
      context: { dbName },
      isOperational: false,
    })
  }
}

export class OperationAbortedError extends BaseError<"operation_aborted"> {
  constructor(operation: string, options: StoreErrorOptions = {}) {
    super(`${operation} aborted`, { ...options, code: "operation_aborted" })
  }
}

export type StoreError =
  | ConnectionError
  | SchemaError
  | UnavailableDataError
  | MissingClientError
  | OperationAbortedError

const storeCodes: ReadonlySet<string> = new Set<StoreErrorCode>([
  "connection_error",
  "schema_error",
  "unavailable_data",
  "missing_client",
  "operation_aborted",
])

export function isStoreError(err: unknown): err is StoreError {
  return err instanceof BaseError && storeCodes.has(err.code)
}
