import { InvalidArgumentError } from "../../errors"
import type { ItemKey } from "../../ports/data"
import type { RequestPath } from "../../ports/transport"

/**
 * Percent-encodes every character outside `A-Z a-z 0-9 _ . - ~`,
 * including `/` and the `!'()*` that encodeURIComponent leaves alone.
 *
 * @throws InvalidArgumentError when the key contains a lone surrogate.
 */
export function encodeKey(key: ItemKey): string {
  let encoded: string
  try {
    encoded = encodeURIComponent(key)
  } catch (err) {
    if (err instanceof URIError) throw InvalidArgumentError.malformedKey()
    throw err
  }

  return encoded.replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
}

export function itemPath(key: ItemKey): RequestPath {
  return `/items/${encodeKey(key)}`
}
