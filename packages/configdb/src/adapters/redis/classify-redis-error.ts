import { ConnectionError, type ErrorContext, errorChain, findInChain, isStoreError, SchemaError } from "@switchconf/errors"
import {
  ClientClosedError,
  ClientOfflineError,
  ConnectionTimeoutError,
  DisconnectsClientError,
  ErrorReply,
  SocketClosedUnexpectedlyError,
} from "redis"

const DRIVER_TRANSPORT_ERRORS = [
  ClientClosedError,
  ClientOfflineError,
  ConnectionTimeoutError,
  DisconnectsClientError,
  SocketClosedUnexpectedlyError,
]

/** Socket error codes that mean the store could not be reached. */
export const NETWORK_ERROR_CODES: ReadonlySet<string> = new Set([
  "EAI_AGAIN",
  "ECONNABORTED",
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOENT",
  "ENOTFOUND",
  "EPIPE",
  "ETIMEDOUT",
])

function isErrorReply(e: unknown): e is ErrorReply {
  return e instanceof ErrorReply
}

function hasNetworkCode(e: unknown): boolean {
  return e instanceof Error && "code" in e && typeof e.code === "string" && NETWORK_ERROR_CODES.has(e.code)
}

/** Whether `err`, or anything in its cause chain, is a lost or refused connection. */
export function isTransportError(err: unknown): boolean {
  return errorChain(err).some((e) => DRIVER_TRANSPORT_ERRORS.some((type) => e instanceof type) || hasNetworkCode(e))
}

/**
 * Map a driver failure onto the store error taxonomy.
 *
 * An error reply means the store understood and rejected the command:
 * {@link SchemaError}. A lost, closed or refused connection is a
 * {@link ConnectionError}. Store errors and everything else (bugs in the
 * calling code included) come back unchanged.
 */
export function classifyRedisError(err: unknown, context: ErrorContext = {}): unknown {
  if (isStoreError(err)) return err

  const reply = findInChain(err, isErrorReply)
  if (reply) return new SchemaError(reply.message, { cause: err, context })

  if (isTransportError(err)) {
    return new ConnectionError(err instanceof Error ? err.message : String(err), { cause: err, context })
  }

  return err
}
