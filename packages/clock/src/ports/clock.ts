import type { EpochSeconds, Milliseconds } from "./time"

export interface TimeSource {
  /**
   * Current time as a Date object.
   *
   * @remarks
   * Avoid for arithmetic; prefer `nowMs()` for calculations.
   */
  now(): Date

  /** Current time as milliseconds since Unix epoch. */
  nowMs(): Milliseconds
}

export type Clock = TimeSource

/** Floors a millisecond instant to whole epoch seconds. */
export function toEpochSeconds(ms: Milliseconds): EpochSeconds {
  return Math.floor(ms / 1000)
}
