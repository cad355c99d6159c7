/**
 * Validation utilities for collections
 *
 * Argument checks shared by the collection methods.
 */

import type { CollectionKey, CollectionOptions } from './types'
import { InvalidArgumentError } from './errors'

/**
 * Check if a value is a valid non-negative integer.
 * Rejects NaN, Infinity, negative values, and non-integers.
 */
export function isValidNonNegativeInteger(value: unknown): value is number {
  return (
    typeof value === 'number' &&
    Number.isFinite(value) &&
    Number.isInteger(value) &&
    value >= 0
  )
}

/**
 * Check if a value is a valid positive integer.
 * Rejects NaN, Infinity, zero, negative values, and non-integers.
 */
export function isValidPositiveInteger(value: unknown): value is number {
  return isValidNonNegativeInteger(value) && value > 0
}

const INTEGER_KEY = /^(0|-?[1-9]\d*)$/

/**
 * Normalise a key: integral numbers and integer strings such as `"3"` become
 * numbers, other strings are kept.
 *
 * @throws InvalidArgumentError for non-integral numbers and non key values
 */
export function normalizeKey(key: unknown): CollectionKey {
  if (typeof key === 'number') {
    if (!Number.isSafeInteger(key)) {
      throw new InvalidArgumentError(`Invalid key: must be an integer or a string. Received: ${key}`)
    }
    return key
  }
  if (typeof key === 'string') {
    return INTEGER_KEY.test(key) && Number.isSafeInteger(Number(key)) ? Number(key) : key
  }
  throw new InvalidArgumentError(`Invalid key: must be an integer or a string. Received: ${String(key)}`)
}

/**
 * Validate collection options.
 * @throws InvalidArgumentError if `literal` or `mutable` is not a boolean
 */
export function validateCollectionOptions(options?: CollectionOptions): void {
  if (!options) {
    return
  }

  if (options.literal !== undefined && typeof options.literal !== 'boolean') {
    throw new InvalidArgumentError(
      `Invalid literal option: must be a boolean. Received: ${String(options.literal)}`
    )
  }
  if (options.mutable !== undefined && typeof options.mutable !== 'boolean') {
    throw new InvalidArgumentError(
      `Invalid mutable option: must be a boolean. Received: ${String(options.mutable)}`
    )
  }
}

/**
 * Validate the size given to `chunk()`.
 * @throws InvalidArgumentError if size is not a positive integer
 */
export function validateChunkSize(size: unknown): asserts size is number {
  if (!isValidPositiveInteger(size)) {
    throw new InvalidArgumentError(`Invalid chunk size: must be a positive integer. Received: ${String(size)}`)
  }
}

/**
 * Validate the offset and length given to `slice()`.
 * @throws InvalidArgumentError if either is not an integer
 */
export function validateSliceBounds(offset: unknown, length?: unknown): void {
  if (typeof offset !== 'number' || !Number.isInteger(offset)) {
    throw new InvalidArgumentError(`Invalid offset: must be an integer. Received: ${String(offset)}`)
  }
  if (length !== undefined && length !== null && (typeof length !== 'number' || !Number.isInteger(length))) {
    throw new InvalidArgumentError(`Invalid length: must be an integer. Received: ${String(length)}`)
  }
}

/**
 * Validate the keys given to `combine()`.
 * @throws InvalidArgumentError if the number of keys differs from the number of entries
 */
export function validateCombineKeys(keys: readonly unknown[], count: number): void {
  if (keys.length !== count) {
    throw new InvalidArgumentError(
      `Invalid keys: expected ${count} keys to match the number of items. Received: ${keys.length}`
    )
  }
}
