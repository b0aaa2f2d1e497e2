export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export { type Clock, type TimeSource, toEpochSeconds } from "./ports/clock"
export type * from "./ports/time"
