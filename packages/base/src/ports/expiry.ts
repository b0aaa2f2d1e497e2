import type { EpochSeconds, Seconds } from "@docbase/clock"

/** Name of the attribute the server reads expirations from. */
export const TTL_ATTRIBUTE = "__expires"

/**
 * Expiration as callers pass it. At most one of the two may be set.
 *
 * @remarks
 * `0` and `null` count as "not set" for both fields.
 */
export type ExpiryOptions = {
  /** Seconds from now. */
  expireIn?: Seconds | null
  /** Absolute instant: a Date, or seconds since the Unix epoch. */
  expireAt?: Date | EpochSeconds | null
}

type NeverExpires = { readonly kind: "never" }
type ExpiresIn = { readonly kind: "in"; readonly seconds: Seconds }
type ExpiresAt = { readonly kind: "at"; readonly at: Date | EpochSeconds }

/** Validated expiration request. */
export type Expiry = NeverExpires | ExpiresIn | ExpiresAt
