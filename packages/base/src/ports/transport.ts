export type HttpMethod = "GET" | "PUT" | "POST" | "PATCH" | "DELETE"

export const JSON_MIME = "application/json"

/** Path relative to the collection root, e.g. `/items` or `/query`. */
export type RequestPath = `/${string}`

export type TransportResponse = {
  status: number
  /** Decoded body; `null` when the server sent none. */
  body: unknown
}

/**
 * Performs one HTTP call against the collection.
 *
 * @remarks
 * - Owns the base URL, credentials, headers, timeouts and JSON encoding.
 * - Resolves for every HTTP status; interpreting it is the caller's job.
 * - Rejects only when no response could be obtained.
 */
export interface HttpTransport {
  request(
    path: RequestPath,
    method: HttpMethod,
    body?: unknown,
    contentType?: string,
  ): Promise<TransportResponse>
}
