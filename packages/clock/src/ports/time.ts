/** A duration in milliseconds. */
export type Milliseconds = number

/** A duration in whole seconds (the unit of the store's EXPIRE command). */
export type Seconds = number

/** Milliseconds since the Unix epoch. */
export type UnixMs = number
