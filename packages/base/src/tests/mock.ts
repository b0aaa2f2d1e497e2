import type { MockProxy } from "vitest-mock-extended"
import type { TransportResponse } from "../ports/transport"

export type Mock<T> = MockProxy<T> & T

export function jsonResponse(status: number, body: unknown = null): TransportResponse {
  return { status, body }
}
