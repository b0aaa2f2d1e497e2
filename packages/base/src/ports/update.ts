import type { Data } from "./data"

/** Brands update operations; no decoded JSON value can carry a symbol key. */
export const UpdateOpBrand: unique symbol = Symbol("docbase.update-op")

type Branded<K extends string> = {
  readonly [UpdateOpBrand]: true
  readonly kind: K
}

/** Removes the attribute. */
export type TrimOperation = Branded<"trim">

/** Adds `value` to a numeric attribute. */
export type IncrementOperation = Branded<"increment"> & { readonly value: number }

/** Adds `values` to the end of a list attribute. */
export type AppendOperation = Branded<"append"> & { readonly values: readonly Data[] }

/** Adds `values` to the start of a list attribute. */
export type PrependOperation = Branded<"prepend"> & { readonly values: readonly Data[] }

export type UpdateOperation =
  | TrimOperation
  | IncrementOperation
  | AppendOperation
  | PrependOperation

export type UpdateOperationKind = UpdateOperation["kind"]

/**
 * Attribute name to either a replacement value or an update operation.
 * Nested attributes are addressed with dotted paths (e.g. `profile.age`).
 */
export type Updates = { readonly [attribute: string]: Data | UpdateOperation }

/** Wire body of `PATCH /items/{key}`. */
export type UpdatePayload = {
  set: { [attribute: string]: Data }
  increment: { [attribute: string]: number }
  append: { [attribute: string]: Data[] }
  prepend: { [attribute: string]: Data[] }
  delete: string[]
}
