import type { Data, Item, ItemData } from "../../ports/data"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v)
}

/** Recursively checks that a decoded JSON value is storable data. */
export function isData(value: unknown): value is Data {
  if (value === null) return true

  switch (typeof value) {
    case "string":
    case "boolean":
      return true
    case "number":
      return Number.isFinite(value)
    case "object":
      if (Array.isArray(value)) return value.every(isData)
      return isRecord(value) && Object.values(value).every(isData)
    default:
      return false
  }
}

export function isItemData(value: unknown): value is ItemData {
  return isRecord(value) && Object.values(value).every(isData)
}

export function isItem(value: unknown): value is Item {
  return isItemData(value) && typeof value.key === "string"
}

/** `true` for attribute mappings; `false` for primitives and lists. */
export function isMapping(data: Data): data is ItemData {
  return isRecord(data)
}

export function isDataList(value: Data | readonly Data[]): value is readonly Data[] {
  return Array.isArray(value)
}
