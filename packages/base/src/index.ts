export {
  UndiciTransport,
  type UndiciTransportDeps,
  type UndiciTransportOptions,
} from "./adapters/http/undici-transport"
export {
  BASE_SERVICE_TIMEOUT_MS,
  type BaseConfig,
  type BaseConfigInput,
  DEFAULT_HOST,
  parseBaseConfig,
} from "./config/base-config"
export { BaseClient, type BaseClientDeps, type BaseClientOptions } from "./core/base-client"
export {
  applyExpiry,
  expiryToEpochSeconds,
  insertTtl,
  resolveExpiry,
} from "./core/expiry/expiry"
export { encodeKey } from "./core/items/item-path"
export { MAX_BATCH_SIZE } from "./core/items/item-payload"
export { buildFetchPayload } from "./core/query/fetch-request"
export { FetchResponse } from "./core/query/fetch-response"
export { encodeUpdate } from "./core/update/encode-update"
export { isUpdateOperation, type UpdateUtil, util } from "./core/update/update-ops"
export { type CreateBaseDeps, createBase } from "./create"
export * from "./errors"
export type { BasePort } from "./ports/base"
export type { Data, Item, ItemData, ItemKey, Primitive, Query } from "./ports/data"
export { type Expiry, type ExpiryOptions, TTL_ATTRIBUTE } from "./ports/expiry"
export {
  DEFAULT_FETCH_LIMIT,
  type FetchOptions,
  type FetchPage,
  type FetchPayload,
  type FetchQuery,
  type PutManyResult,
} from "./ports/fetch"
export {
  type HttpMethod,
  type HttpTransport,
  JSON_MIME,
  type RequestPath,
  type TransportResponse,
} from "./ports/transport"
export type {
  AppendOperation,
  IncrementOperation,
  PrependOperation,
  TrimOperation,
  UpdateOperation,
  UpdateOperationKind,
  UpdatePayload,
  Updates,
} from "./ports/update"
