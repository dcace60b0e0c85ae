/** Milliseconds since the Unix epoch, or a span in milliseconds. */
export type Milliseconds = number

/** A span in whole or fractional seconds. */
export type Seconds = number
