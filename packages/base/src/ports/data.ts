export type Primitive = string | number | boolean | null

/** Any value the database can store. */
export type Data = Primitive | Data[] | { [attribute: string]: Data }

/** An attribute mapping, with or without a key. */
export type ItemData = { [attribute: string]: Data }

/**
 * Identifies an item uniquely within a collection.
 * Either supplied by the caller or generated by the server.
 */
export type ItemKey = string

/** A stored item. Items returned by the server always carry their key. */
export type Item = ItemData & { key: ItemKey }

/**
 * A filter: attribute path (dotted for nested attributes, optionally suffixed
 * with an operator such as `age?gt`) to the value compared against.
 */
export type Query = { [path: string]: Data }
