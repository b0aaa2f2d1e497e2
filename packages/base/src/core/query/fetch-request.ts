import type { Query } from "../../ports/data"
import {
  DEFAULT_FETCH_LIMIT,
  type FetchOptions,
  type FetchPayload,
  type FetchQuery,
} from "../../ports/fetch"
import { assertLimit } from "../validation/validation"

function isQueryList(query: FetchQuery): query is readonly Query[] {
  return Array.isArray(query)
}

/** A single filter becomes a one-element list; empty filters mean "everything". */
export function normalizeQuery(query: FetchQuery | null | undefined): readonly Query[] {
  if (!query) return []
  if (isQueryList(query)) return query

  return Object.keys(query).length > 0 ? [query] : []
}

/**
 * Builds the `POST /query` body.
 *
 * @remarks
 * A `last` that is not a string (e.g. a stray boolean) is sent as `null`.
 */
export function buildFetchPayload(
  query?: FetchQuery | null,
  options: FetchOptions = {},
): FetchPayload {
  const limit = options.limit ?? DEFAULT_FETCH_LIMIT
  assertLimit(limit)

  const filters = normalizeQuery(query)

  return {
    limit,
    last: typeof options.last === "string" ? options.last : null,
    ...(filters.length > 0 && { query: filters }),
  }
}
