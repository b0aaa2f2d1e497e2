import { type EpochSeconds, type TimeSource, toEpochSeconds } from "@docbase/clock"
import { InvalidArgumentError } from "../../errors"
import type { Data } from "../../ports/data"
import { type Expiry, type ExpiryOptions, TTL_ATTRIBUTE } from "../../ports/expiry"

const NEVER: Expiry = Object.freeze({ kind: "never" })

/** `null`, `undefined` and `0` mean "not set"; anything else, NaN included, is validated. */
function isSet<T>(value: T | null | undefined): value is T {
  return value != null && value !== 0
}

function describeValue(value: unknown): string {
  if (typeof value === "number") return String(value)
  if (value instanceof Date) return "Invalid Date"
  return typeof value
}

/**
 * Validates the caller's expiry options into a single variant.
 *
 * @remarks
 * `0`, `null` and `undefined` mean "not set", so
 * `{ expireIn: 0, expireAt: date }` is a valid absolute expiry.
 *
 * @throws InvalidArgumentError `invalid_argument` when both are set,
 *   `invalid_type` when the set one is not a usable number or Date.
 */
export function resolveExpiry(options: ExpiryOptions = {}): Expiry {
  const { expireIn, expireAt } = options

  if (isSet(expireIn) && isSet(expireAt)) {
    throw InvalidArgumentError.conflictingExpiry()
  }

  if (isSet(expireIn)) {
    if (typeof expireIn !== "number" || !Number.isFinite(expireIn)) {
      throw InvalidArgumentError.invalidExpireIn(describeValue(expireIn))
    }
    return { kind: "in", seconds: expireIn }
  }

  if (isSet(expireAt)) {
    if (expireAt instanceof Date) {
      if (Number.isNaN(expireAt.getTime())) {
        throw InvalidArgumentError.invalidExpireAt(describeValue(expireAt))
      }
      return { kind: "at", at: expireAt }
    }

    if (typeof expireAt === "number" && Number.isFinite(expireAt)) {
      return { kind: "at", at: expireAt }
    }

    throw InvalidArgumentError.invalidExpireAt(describeValue(expireAt))
  }

  return NEVER
}

/**
 * Canonical expiry instant in whole epoch seconds, or `undefined` for "never".
 *
 * Sub-second precision is discarded before conversion, so the result never
 * rounds up past the requested instant.
 */
export function expiryToEpochSeconds(
  expiry: Expiry,
  clock: TimeSource,
): EpochSeconds | undefined {
  switch (expiry.kind) {
    case "never":
      return undefined
    case "in":
      return toEpochSeconds(clock.nowMs() + expiry.seconds * 1000)
    case "at":
      return expiry.at instanceof Date
        ? toEpochSeconds(expiry.at.getTime())
        : Math.trunc(expiry.at)
    default: {
      const unreachable: never = expiry
      return unreachable
    }
  }
}

/** Writes the expiry under `attribute`, overwriting any existing value. No-op for "never". */
export function applyExpiry(
  target: { [attribute: string]: Data },
  expiry: Expiry,
  clock: TimeSource,
  attribute: string = TTL_ATTRIBUTE,
): void {
  const seconds = expiryToEpochSeconds(expiry, clock)
  if (seconds === undefined) return

  target[attribute] = seconds
}

/**
 * Validates `options` and injects the resulting TTL into `target`.
 * On validation failure `target` is left untouched.
 */
export function insertTtl(
  target: { [attribute: string]: Data },
  attribute: string,
  options: ExpiryOptions,
  clock: TimeSource,
): void {
  applyExpiry(target, resolveExpiry(options), clock, attribute)
}
