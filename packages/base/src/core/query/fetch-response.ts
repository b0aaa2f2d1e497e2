import { isDeepStrictEqual } from "node:util"
import { z } from "zod"
import type { Item } from "../../ports/data"
import type { FetchPage } from "../../ports/fetch"
import { isItem } from "../items/data"

export const itemSchema = z.custom<Item>(isItem, "expected an item with a string key")

export const fetchBodySchema = z.object({
  paging: z.object({
    size: z.number().int().nonnegative(),
    last: z.string().nullish(),
  }),
  items: z.array(itemSchema).nullish(),
})

export type FetchBody = z.infer<typeof fetchBodySchema>

/**
 * One page of fetch results. Immutable; iterate it or read `items` directly.
 *
 * @example
 * ```ts
 * let res = await base.fetch({ "age?gt": 18 })
 * const all = [...res]
 * while (res.last) {
 *   res = await base.fetch({ "age?gt": 18 }, { last: res.last })
 *   all.push(...res)
 * }
 * ```
 */
export class FetchResponse implements FetchPage, Iterable<Item> {
  readonly count: number
  readonly last: string | undefined
  readonly items: readonly Item[]

  constructor(count: number = 0, last?: string | null, items: readonly Item[] = []) {
    this.count = count
    this.last = last ? last : undefined
    this.items = Object.freeze([...items])
    Object.freeze(this)
  }

  static fromBody(body: FetchBody): FetchResponse {
    return new FetchResponse(body.paging.size, body.paging.last, body.items ?? [])
  }

  get length(): number {
    return this.items.length
  }

  [Symbol.iterator](): Iterator<Item> {
    return this.items[Symbol.iterator]()
  }

  equals(other: FetchPage): boolean {
    return (
      this.count === other.count &&
      this.last === other.last &&
      isDeepStrictEqual(this.items, other.items)
    )
  }
}
