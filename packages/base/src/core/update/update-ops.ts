import type { Data } from "../../ports/data"
import {
  type AppendOperation,
  type IncrementOperation,
  type PrependOperation,
  type TrimOperation,
  type UpdateOperation,
  UpdateOpBrand,
} from "../../ports/update"
import { isDataList } from "../items/data"

function toValues(value: Data | readonly Data[]): readonly Data[] {
  return isDataList(value) ? [...value] : [value]
}

function trim(): TrimOperation {
  return { [UpdateOpBrand]: true, kind: "trim" }
}

function increment(value: number = 1): IncrementOperation {
  return { [UpdateOpBrand]: true, kind: "increment", value }
}

/** A single non-list value is appended as a one-element list. */
function append(value: Data | readonly Data[]): AppendOperation {
  return { [UpdateOpBrand]: true, kind: "append", values: toValues(value) }
}

/** A single non-list value is prepended as a one-element list. */
function prepend(value: Data | readonly Data[]): PrependOperation {
  return { [UpdateOpBrand]: true, kind: "prepend", values: toValues(value) }
}

/**
 * Update operation factories.
 *
 * @example
 * ```ts
 * await base.update(
 *   { visits: util.increment(), tags: util.append("new"), draft: util.trim() },
 *   "user-1",
 * )
 * ```
 */
export const util = Object.freeze({ trim, increment, append, prepend })

export type UpdateUtil = typeof util

export function isUpdateOperation(value: Data | UpdateOperation): value is UpdateOperation {
  return typeof value === "object" && value !== null && UpdateOpBrand in value
}
