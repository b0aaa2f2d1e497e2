import type { Item, Query } from "./data"

export const DEFAULT_FETCH_LIMIT = 1000

export interface FetchOptions {
  /** Max items per page. Default: 1000 */
  limit?: number

  /** Opaque cursor from a previous page. Anything but a string is ignored. */
  last?: string | null
}

export type FetchQuery = Query | readonly Query[]

/** Wire body of `POST /query`. */
export type FetchPayload = {
  limit: number
  last: string | null
  query?: readonly Query[]
}

/** One page of a fetch. */
export interface FetchPage {
  readonly count: number
  /** Cursor for the next page. Undefined when no more results. */
  readonly last: string | undefined
  readonly items: readonly Item[]
}

/** Wire body of `PUT /items`, passed through verbatim. */
export type PutManyResult = {
  processed?: { items: Item[] } | undefined
  failed?: { items: unknown[] } | undefined
  [field: string]: unknown
}
