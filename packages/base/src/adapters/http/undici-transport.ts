import type { Milliseconds, TimeSource } from "@docbase/clock"
import type { Logger } from "@docbase/logger"
import { type Dispatcher, request } from "undici"
import { TransportError } from "../../errors"
import {
  type HttpMethod,
  type HttpTransport,
  JSON_MIME,
  type RequestPath,
  type TransportResponse,
} from "../../ports/transport"

export interface UndiciTransportDeps {
  clock: TimeSource
  logger: Logger
  /** Connection pool or mock agent. Defaults to undici's global dispatcher. */
  dispatcher?: Dispatcher
}

export interface UndiciTransportOptions {
  host: string
  projectId: string
  projectKey: string
  /** Collection name. */
  collection: string
  /** Applied to both headers and body reads. */
  timeoutMs: Milliseconds
}

function isJson(contentType: string | string[] | undefined): boolean {
  const value = Array.isArray(contentType) ? contentType.join(",") : contentType
  return value?.toLowerCase().includes(JSON_MIME) ?? false
}

/**
 * Sends collection requests to `https://{host}/v1/{projectId}/{collection}{path}`.
 * Authenticates with the project key in the `x-api-key` header.
 */
export class UndiciTransport implements HttpTransport {
  private readonly baseUrl: string

  constructor(
    private readonly deps: UndiciTransportDeps,
    private readonly options: UndiciTransportOptions,
  ) {
    this.baseUrl = `https://${options.host}/v1/${options.projectId}/${options.collection}`
  }

  async request(
    path: RequestPath,
    method: HttpMethod,
    body?: unknown,
    contentType?: string,
  ): Promise<TransportResponse> {
    const startedMs = this.deps.clock.nowMs()
    const headers: Record<string, string> = { "x-api-key": this.options.projectKey }

    if (body !== undefined) {
      headers["content-type"] = contentType ?? JSON_MIME
    }

    try {
      const response = await request(`${this.baseUrl}${path}`, {
        method,
        headers,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs,
        ...(body !== undefined && { body: JSON.stringify(body) }),
        ...(this.deps.dispatcher && { dispatcher: this.deps.dispatcher }),
      })

      const text = await response.body.text()
      const status = response.statusCode

      this.deps.logger.debug("Request completed", {
        method,
        path,
        status,
        durationMs: this.deps.clock.nowMs() - startedMs,
      })

      return { status, body: this.decode(text, response.headers["content-type"]) }
    } catch (err) {
      this.deps.logger.error("Request failed", {
        method,
        path,
        durationMs: this.deps.clock.nowMs() - startedMs,
        err,
      })
      throw TransportError.requestFailed(method, path, err)
    }
  }

  /** JSON bodies are parsed; unparseable JSON is returned as text for the caller to reject. */
  private decode(text: string, contentType: string | string[] | undefined): unknown {
    if (text.length === 0) return null
    if (!isJson(contentType)) return text

    try {
      return JSON.parse(text)
    } catch {
      return text
    }
  }
}
