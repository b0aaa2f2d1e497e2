import { describe, expect, it } from "vitest"
import { type Clock, toEpochSeconds } from "../clock"

export type ClockHarness = {
  name: string
  make: () => Clock
}

export function describeClockContract(h: ClockHarness) {
  describe(`${h.name} (Clock contract)`, () => {
    it("now() returns a valid Date", () => {
      const result = h.make().now()

      expect(result).toBeInstanceOf(Date)
      expect(Number.isNaN(result.getTime())).toBe(false)
    })

    it("nowMs() returns an integer", () => {
      const result = h.make().nowMs()

      expect(Number.isInteger(result)).toBe(true)
    })

    it("now() and nowMs() are consistent", () => {
      const clock = h.make()
      const date = clock.now()
      const ms = clock.nowMs()

      expect(Math.abs(date.getTime() - ms)).toBeLessThan(5)
    })

    it("epoch seconds never run ahead of the millisecond reading", () => {
      const ms = h.make().nowMs()

      expect(toEpochSeconds(ms) * 1000).toBeLessThanOrEqual(ms)
    })
  })
}
