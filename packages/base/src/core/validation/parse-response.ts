import type { ZodType } from "zod"
import { RequestFailedError } from "../../errors"
import type { TransportResponse } from "../../ports/transport"
import { toIssues } from "./issues"

/**
 * Validates a success response body against its wire contract.
 *
 * @throws RequestFailedError with code `invalid_response` when the body does not match.
 */
export function parseResponse<T>(
  schema: ZodType<T>,
  operation: string,
  response: TransportResponse,
): T {
  const result = schema.safeParse(response.body)

  if (!result.success) {
    throw RequestFailedError.invalidResponse(
      operation,
      response.status,
      response.body,
      toIssues(result.error),
    )
  }

  return result.data
}
