import type { FetchResponse } from "./fetch-response"

export type FetchPageFn = (last: string | undefined) => Promise<FetchResponse>

/**
 * Yields pages until the server stops returning a cursor.
 * Each page is one request; nothing is prefetched.
 */
export async function* paginate(
  fetchPage: FetchPageFn,
): AsyncGenerator<FetchResponse, void, undefined> {
  let last: string | undefined

  do {
    const page = await fetchPage(last)
    yield page
    last = page.last
  } while (last !== undefined)
}
