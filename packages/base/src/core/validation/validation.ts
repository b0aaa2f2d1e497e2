import { InvalidArgumentError } from "../../errors"

export function assertKey(key: unknown, parameter: string = "key"): asserts key is string {
  if (typeof key !== "string" || key.length === 0) {
    throw InvalidArgumentError.emptyKey(parameter)
  }
}

export function assertBatchSize(size: number, max: number): void {
  if (size > max) {
    throw InvalidArgumentError.batchTooLarge(size, max)
  }
}

export function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw InvalidArgumentError.invalidLimit(limit)
  }
}
