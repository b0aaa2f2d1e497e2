import type { TimeSource } from "@docbase/clock"
import { InvalidArgumentError } from "../../errors"
import type { Data, ItemData, ItemKey } from "../../ports/data"
import type { Expiry } from "../../ports/expiry"
import { applyExpiry } from "../expiry/expiry"
import { assertBatchSize } from "../validation/validation"
import { isMapping } from "./data"

/** Server-side ceiling on items per `PUT /items`. */
export const MAX_BATCH_SIZE = 25

/**
 * Shapes caller data into an item body.
 *
 * - Mappings are shallow-copied; anything else becomes `{ value: data }`.
 * - A non-empty `key` argument overrides any `key` attribute in `data`.
 * - Without a key the server generates one; none is invented here.
 */
export function toItemPayload(data: Data, key?: ItemKey | null): ItemData {
  const item: ItemData = isMapping(data) ? { ...data } : { value: data }

  if (key) {
    item.key = key
  }

  return item
}

export function toSingleItemPayload(
  data: Data,
  key: ItemKey | null | undefined,
  expiry: Expiry,
  clock: TimeSource,
): ItemData {
  const item = toItemPayload(data, key)
  applyExpiry(item, expiry, clock)

  return item
}

/**
 * Shapes a `putMany` batch.
 *
 * @throws InvalidArgumentError when the batch exceeds {@link MAX_BATCH_SIZE}
 *   or two items share an explicit key.
 */
export function toBatchPayload(
  items: readonly Data[],
  expiry: Expiry,
  clock: TimeSource,
): ItemData[] {
  assertBatchSize(items.length, MAX_BATCH_SIZE)

  const seen = new Set<string>()

  return items.map((data) => {
    const item = toItemPayload(data)

    if (typeof item.key === "string" && item.key.length > 0) {
      if (seen.has(item.key)) {
        throw InvalidArgumentError.duplicateKey(item.key)
      }
      seen.add(item.key)
    }

    applyExpiry(item, expiry, clock)

    return item
  })
}

/** Human-readable key of an item body, for error messages. */
export function describeKey(item: ItemData): string {
  const key = item.key
  if (typeof key === "string") return key
  return key === undefined ? "" : JSON.stringify(key)
}
