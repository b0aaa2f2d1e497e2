/** Duration or instant expressed in milliseconds. */
export type Milliseconds = number

/** Duration or instant expressed in whole or fractional seconds. */
export type Seconds = number

/** Seconds since the Unix epoch, truncated to an integer. */
export type EpochSeconds = number
