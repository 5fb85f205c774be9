/**
 * Outcome of a store read.
 *
 * Absence is an expected outcome (the writer may not have run yet), so it is a
 * value rather than an exception.
 */
export type ReadResult<T> = { kind: "found"; value: T } | { kind: "unavailable" }
