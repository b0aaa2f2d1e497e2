import type { TimeSource } from "@docbase/clock"
import type { Logger } from "@docbase/logger"
import { z } from "zod"
import { AlreadyExistsError, NotFoundError, RequestFailedError } from "../errors"
import type { BasePort } from "../ports/base"
import type { Data, Item, ItemKey } from "../ports/data"
import type { ExpiryOptions } from "../ports/expiry"
import type { FetchOptions, FetchQuery, PutManyResult } from "../ports/fetch"
import { JSON_MIME, type HttpTransport, type TransportResponse } from "../ports/transport"
import type { Updates } from "../ports/update"
import { applyExpiry, resolveExpiry } from "./expiry/expiry"
import { itemPath } from "./items/item-path"
import { describeKey, toBatchPayload, toSingleItemPayload } from "./items/item-payload"
import { buildFetchPayload } from "./query/fetch-request"
import { FetchResponse, fetchBodySchema, itemSchema } from "./query/fetch-response"
import { paginate } from "./query/paginate"
import { encodeUpdate } from "./update/encode-update"
import { type UpdateUtil, util } from "./update/update-ops"
import { parseResponse } from "./validation/parse-response"
import { assertKey } from "./validation/validation"

const putBodySchema = z
  .object({
    processed: z.object({ items: z.array(itemSchema) }).nullish(),
  })
  .nullable()

const putManyBodySchema = z.looseObject({
  processed: z.looseObject({ items: z.array(itemSchema) }).optional(),
  failed: z.looseObject({ items: z.array(z.unknown()) }).optional(),
})

export type BaseClientDeps = {
  transport: HttpTransport
  clock: TimeSource
  logger: Logger
}

export type BaseClientOptions = {
  /** Collection name; only used to scope log lines. */
  name: string
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300
}

export class BaseClient implements BasePort {
  readonly util: UpdateUtil = util

  private readonly logger: Logger

  constructor(
    private readonly deps: BaseClientDeps,
    readonly options: BaseClientOptions,
  ) {
    this.logger = deps.logger.child({ collection: options.name })
  }

  async get(key: ItemKey): Promise<Item> {
    assertKey(key)

    const res = await this.deps.transport.request(itemPath(key), "GET")

    if (res.status === 404) throw new NotFoundError(key)
    this.assertSuccess("get", res, { key })

    return parseResponse(itemSchema, "get", res)
  }

  async delete(key: ItemKey): Promise<void> {
    assertKey(key)

    const res = await this.deps.transport.request(itemPath(key), "DELETE")

    this.assertSuccess("delete", res, { key })
  }

  async insert(data: Data, key?: ItemKey | null, expiry?: ExpiryOptions): Promise<Item> {
    const item = toSingleItemPayload(data, key, resolveExpiry(expiry), this.deps.clock)

    const res = await this.deps.transport.request("/items", "POST", { item }, JSON_MIME)

    if (res.status === 409) throw new AlreadyExistsError(describeKey(item))
    this.assertSuccess("insert", res, { key: describeKey(item) })

    return parseResponse(itemSchema, "insert", res)
  }

  async put(data: Data, key?: ItemKey | null, expiry?: ExpiryOptions): Promise<Item | null> {
    const item = toSingleItemPayload(data, key, resolveExpiry(expiry), this.deps.clock)

    const res = await this.deps.transport.request("/items", "PUT", { items: [item] }, JSON_MIME)

    this.assertSuccess("put", res, { key: describeKey(item) })

    const body = res.status === 207 ? parseResponse(putBodySchema, "put", res) : null
    const processed = body?.processed?.items[0]

    if (!processed) {
      this.logger.warn("Put returned no processed item", {
        operation: "put",
        key: describeKey(item),
        status: res.status,
      })
      return null
    }

    return processed
  }

  async putMany(items: readonly Data[], expiry?: ExpiryOptions): Promise<PutManyResult> {
    const batch = toBatchPayload(items, resolveExpiry(expiry), this.deps.clock)

    const res = await this.deps.transport.request("/items", "PUT", { items: batch }, JSON_MIME)

    this.assertSuccess("putMany", res, { size: batch.length })

    return parseResponse(putManyBodySchema, "putMany", res)
  }

  async fetch(query?: FetchQuery | null, options?: FetchOptions): Promise<FetchResponse> {
    const payload = buildFetchPayload(query, options)

    const res = await this.deps.transport.request("/query", "POST", payload, JSON_MIME)

    this.assertSuccess("fetch", res)

    return FetchResponse.fromBody(parseResponse(fetchBodySchema, "fetch", res))
  }

  /**
   * Walks every page of a fetch, one request per page.
   *
   * @example
   * ```ts
   * for await (const page of base.pages({ active: true }, { limit: 100 })) {
   *   for (const item of page) handle(item)
   * }
   * ```
   */
  pages(
    query?: FetchQuery | null,
    options: Omit<FetchOptions, "last"> = {},
  ): AsyncGenerator<FetchResponse, void, undefined> {
    return paginate((last) => this.fetch(query, { ...options, ...(last !== undefined && { last }) }))
  }

  async update(updates: Updates, key: ItemKey, expiry?: ExpiryOptions): Promise<void> {
    assertKey(key)

    const resolved = resolveExpiry(expiry)
    const payload = encodeUpdate(updates)
    applyExpiry(payload.set, resolved, this.deps.clock)

    const res = await this.deps.transport.request(itemPath(key), "PATCH", payload, JSON_MIME)

    if (res.status === 404) throw new NotFoundError(key)
    this.assertSuccess("update", res, { key })
  }

  private assertSuccess(
    operation: string,
    res: TransportResponse,
    context: Record<string, unknown> = {},
  ): void {
    if (isSuccess(res.status)) return

    throw RequestFailedError.fromStatus(operation, res.status, res.body, context)
  }
}
