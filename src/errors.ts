/**
 * Collection Errors
 *
 * Every error thrown by a collection extends `CollectionError` and carries a
 * stable `code` alongside the structured details of the failure.
 */

import type { CollectionKey } from './types'

export type CollectionErrorCode =
  | 'TYPE_MISMATCH'
  | 'LITERAL_TYPE_MISMATCH'
  | 'ITEM_NOT_FOUND'
  | 'FIELD_NOT_FOUND'
  | 'UNSUPPORTED_ITEM_TYPE'
  | 'IMMUTABLE_COLLECTION'
  | 'COLLECTION_TYPE_MISMATCH'
  | 'INVALID_OPERATOR'
  | 'INVALID_ARGUMENT'

/**
 * Base class for all collection errors
 */
export class CollectionError extends Error {
  constructor(
    message: string,
    public readonly code: CollectionErrorCode
  ) {
    super(message)
    this.name = 'CollectionError'
  }
}

/**
 * An item does not satisfy the expected type of the collection
 */
export class TypeMismatchError extends CollectionError {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
    public readonly key?: CollectionKey,
    code: CollectionErrorCode = 'TYPE_MISMATCH'
  ) {
    super(
      `Invalid item type encountered${key === undefined ? '' : ` at key [${key}]`}, expecting type of [${expected}], [${actual}] given.`,
      code
    )
    this.name = 'TypeMismatchError'
  }
}

/**
 * An item does not equal the literal value the collection is bound to
 */
export class LiteralTypeMismatchError extends TypeMismatchError {
  constructor(expected: string, actual: string, key?: CollectionKey) {
    super(expected, actual, key, 'LITERAL_TYPE_MISMATCH')
    this.message = `Invalid item type encountered${key === undefined ? '' : ` at key [${key}]`}, expecting literal type of [${expected}], [${actual}] given.`
    this.name = 'LiteralTypeMismatchError'
  }
}

export class ItemNotFoundError extends CollectionError {
  constructor(public readonly key: CollectionKey) {
    super(`Item [${key}] does not exist in the collection.`, 'ITEM_NOT_FOUND')
    this.name = 'ItemNotFoundError'
  }
}

/**
 * A field (or one segment of a dotted path) could not be resolved on an item
 */
export class FieldNotFoundError extends CollectionError {
  constructor(
    public readonly field: string,
    public readonly path: string = field
  ) {
    super(
      path === field
        ? `Field [${field}] is not found in the collection item.`
        : `Field [${field}] of path [${path}] is not found in the collection item.`,
      'FIELD_NOT_FOUND'
    )
    this.name = 'FieldNotFoundError'
  }
}

/**
 * The item shape has no defined extraction behavior
 */
export class UnsupportedItemTypeError extends CollectionError {
  constructor(
    public readonly column: string | null,
    public readonly itemType: string
  ) {
    super(
      column === null
        ? `Cannot use an empty column on non stringable items of type [${itemType}].`
        : `Cannot find column [${column}] in collection item type [${itemType}].`,
      'UNSUPPORTED_ITEM_TYPE'
    )
    this.name = 'UnsupportedItemTypeError'
  }
}

export class ImmutableCollectionError extends CollectionError {
  constructor(operation: string) {
    super(`Cannot ${operation} an immutable collection.`, 'IMMUTABLE_COLLECTION')
    this.name = 'ImmutableCollectionError'
  }
}

/**
 * Two collections with different expected types were combined with type checking on
 */
export class CollectionTypeMismatchError extends CollectionError {
  constructor(
    public readonly expected: string,
    public readonly actual: string,
    reason?: string
  ) {
    super(reason ?? `Collection type mismatch, expecting type of [${expected}], [${actual}] given.`, 'COLLECTION_TYPE_MISMATCH')
    this.name = 'CollectionTypeMismatchError'
  }
}

export class InvalidOperatorError extends CollectionError {
  constructor(public readonly operator: unknown) {
    super(
      `Invalid comparison operator: ${typeof operator === 'string' ? JSON.stringify(operator) : String(operator)}`,
      'INVALID_OPERATOR'
    )
    this.name = 'InvalidOperatorError'
  }
}

export class InvalidArgumentError extends CollectionError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT')
    this.name = 'InvalidArgumentError'
  }
}

/**
 * Check if value is any collection error
 */
export function isCollectionError(value: unknown): value is CollectionError {
  return value instanceof CollectionError
}
