import { SystemClock, type TimeSource } from "@docbase/clock"
import { createPinoLogger, type Logger } from "@docbase/logger"
import type { Dispatcher } from "undici"
import { UndiciTransport } from "./adapters/http/undici-transport"
import { type BaseConfigInput, parseBaseConfig } from "./config/base-config"
import { BaseClient } from "./core/base-client"
import type { HttpTransport } from "./ports/transport"

export interface CreateBaseDeps {
  /** Replaces the HTTP transport entirely; `dispatcher` is then unused. */
  transport?: HttpTransport
  dispatcher?: Dispatcher
  clock?: TimeSource
  logger?: Logger
}

/**
 * Builds a client bound to one collection.
 *
 * @example
 * ```ts
 * const users = createBase({ name: "users", projectKey: process.env.PROJECT_KEY ?? "" })
 * await users.put({ name: "Ada" }, "ada")
 * ```
 */
export function createBase(options: BaseConfigInput, deps: CreateBaseDeps = {}): BaseClient {
  const config = parseBaseConfig(options)

  const logger = deps.logger ?? createPinoLogger(config.logging)
  const clock = deps.clock ?? new SystemClock()

  const transport =
    deps.transport ??
    new UndiciTransport(
      { clock, logger, ...(deps.dispatcher && { dispatcher: deps.dispatcher }) },
      {
        host: config.host,
        projectId: config.projectId,
        projectKey: config.projectKey,
        collection: config.name,
        timeoutMs: config.timeoutMs,
      },
    )

  return new BaseClient({ transport, clock, logger }, { name: config.name })
}
