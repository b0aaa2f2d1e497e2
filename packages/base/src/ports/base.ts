import type { Data, Item, ItemKey } from "./data"
import type { ExpiryOptions } from "./expiry"
import type { FetchOptions, FetchPage, FetchQuery, PutManyResult } from "./fetch"
import type { Updates } from "./update"

/**
 * Operations against one remote collection.
 *
 * @remarks
 * - Argument problems raise `InvalidArgumentError` before any request is sent.
 * - Nothing is retried; the first failure reaches the caller.
 */
export interface BasePort {
  /**
   * Retrieve an item by key.
   *
   * @throws NotFoundError when the key does not exist.
   */
  get(key: ItemKey): Promise<Item>

  /** Delete an item. Deleting a missing key succeeds. */
  delete(key: ItemKey): Promise<void>

  /**
   * Create an item; fails if the key is taken.
   *
   * @remarks
   * - Non-mapping data is stored as `{ value: data }`.
   * - Without a key the server generates one.
   *
   * @throws AlreadyExistsError when an item with the key exists.
   */
  insert(data: Data, key?: ItemKey | null, expiry?: ExpiryOptions): Promise<Item>

  /**
   * Create or overwrite an item.
   *
   * @returns The stored item, or `null` when the server skipped it.
   */
  put(data: Data, key?: ItemKey | null, expiry?: ExpiryOptions): Promise<Item | null>

  /**
   * Create or overwrite up to 25 items in one request.
   *
   * @returns The server's per-item result, unmodified.
   */
  putMany(items: readonly Data[], expiry?: ExpiryOptions): Promise<PutManyResult>

  /**
   * Fetch one page of items matching `query` (all items when omitted).
   * Feed `last` back in to continue.
   */
  fetch(query?: FetchQuery | null, options?: FetchOptions): Promise<FetchPage>

  /**
   * Apply partial updates to an existing item.
   *
   * @throws NotFoundError when the key does not exist.
   */
  update(updates: Updates, key: ItemKey, expiry?: ExpiryOptions): Promise<void>
}
