import type { UpdatePayload, Updates } from "../../ports/update"
import { isUpdateOperation } from "./update-ops"

export function emptyUpdatePayload(): UpdatePayload {
  return { set: {}, increment: {}, append: {}, prepend: {}, delete: [] }
}

/**
 * Sorts each requested mutation into its wire bucket.
 * Plain values land in `set`; each attribute ends up in exactly one bucket.
 */
export function encodeUpdate(updates: Updates): UpdatePayload {
  const payload = emptyUpdatePayload()

  for (const [attribute, value] of Object.entries(updates)) {
    if (!isUpdateOperation(value)) {
      payload.set[attribute] = value
      continue
    }

    switch (value.kind) {
      case "trim":
        payload.delete.push(attribute)
        break
      case "increment":
        payload.increment[attribute] = value.value
        break
      case "append":
        payload.append[attribute] = [...value.values]
        break
      case "prepend":
        payload.prepend[attribute] = [...value.values]
        break
      default: {
        const unreachable: never = value
        throw new Error(`Unhandled update operation: ${JSON.stringify(unreachable)}`)
      }
    }
  }

  return payload
}
