import { type ErrorContext, UnavailableDataError } from "@switchconf/errors"
import type { ReadResult } from "../../ports/read-result"

/**
 * Unwrap a read that the caller cannot do without.
 *
 * @throws UnavailableDataError when the data is absent.
 */
export function requireFound<T>(result: ReadResult<T>, message: string, context: ErrorContext = {}): T {
  if (result.kind === "found") return result.value
  throw new UnavailableDataError(message, { context })
}
