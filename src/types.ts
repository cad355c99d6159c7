/**
 * Collection Types
 *
 * Type definitions for typed, runtime-checked collections.
 *
 * A collection is an ordered set of key/value entries with an optional
 * expected item type. Entries are checked against that type on construction
 * and on every mutation.
 */

// =============================================================================
// Keys & Entries
// =============================================================================

/**
 * Key of a collection entry. Integer keys behave like array indexes,
 * string keys like associative array keys.
 */
export type CollectionKey = number | string

/**
 * A single key/value pair stored in a collection
 */
export type Entry<T> = [key: CollectionKey, value: T]

/**
 * Predicate used by `filter()` and built internally by the `where*` methods
 */
export type Predicate<T> = (item: T, key: CollectionKey) => boolean

/**
 * Comparator used by the set-algebra methods. Returns 0 when both values are equal.
 */
export type Comparator = (a: unknown, b: unknown) => number

/**
 * Field name or dotted path. `null`, `undefined` and `''` mean "the item itself".
 */
export type Column = string | null | undefined

// =============================================================================
// Type Tags
// =============================================================================

/**
 * Names of the built-in value types an item can be checked against
 */
export const Type = {
  Any: 'mixed',
  String: 'string',
  Integer: 'integer',
  Float: 'float',
  Boolean: 'boolean',
  Null: 'null',
  Array: 'array',
  Object: 'object',
  Callable: 'callable',
  Symbol: 'symbol',
} as const

export type TypeTag = Exclude<(typeof Type)[keyof typeof Type], typeof Type.Any>

const TYPE_TAGS: ReadonlySet<string> = new Set<string>(
  Object.values(Type).filter((tag) => tag !== Type.Any)
)

/**
 * Any class constructor. Abstract classes are accepted as well.
 */
export type Constructor<T = unknown> = abstract new (...args: never[]) => T

/**
 * Resolved expected type of a collection
 */
export type ExpectedType =
  | { kind: 'any' }
  | { kind: 'scalar'; tag: TypeTag }
  | { kind: 'class'; name: string; ctor?: Constructor }
  | { kind: 'literal'; value: unknown }

// =============================================================================
// Options
// =============================================================================

export interface CollectionOptions {
  /**
   * Expected item type: a type tag, `Type.Any`, a class constructor or class
   * name, or (with `literal`) the value every item must equal. Defaults to `Type.Any`.
   */
  type?: unknown
  /** Treat `type` as a literal value every item must equal */
  literal?: boolean
  /** Mutate in place instead of returning copies */
  mutable?: boolean
}

/**
 * Plain, JSON-safe form of a collection produced by `serialize()`
 */
export interface SerializedCollection {
  type: unknown
  literal: boolean
  mutable: boolean
  entries: Array<Entry<unknown>>
}

// =============================================================================
// Capabilities
// =============================================================================

/**
 * Values that can expose themselves as a plain array or record
 */
export interface Arrayable<T = unknown> {
  toArray(): T[] | Record<string, T>
}

/**
 * Shape of an item as seen by the field extractor
 */
export type ItemShape =
  | { kind: 'scalar'; value: string | number | bigint | boolean | null | undefined }
  | { kind: 'mapping'; value: Record<string, unknown> | unknown[] | Map<unknown, unknown> }
  | { kind: 'convertible'; value: Arrayable & object }
  | { kind: 'object'; value: object }
  | { kind: 'unsupported'; value: unknown }

// =============================================================================
// Comparison Operators
// =============================================================================

export type EqualityOperator = '=' | '==' | '===' | '!=' | '<>' | '!=='
export type OrderingOperator = '>' | '<' | '>=' | '<='
export type RangeOperator = 'BETWEEN' | 'NOT_BETWEEN'
export type MembershipOperator = 'IN' | 'NOT_IN'
export type LikeOperator = '%LIKE%' | 'LIKE%' | '%LIKE' | '%NOT_LIKE%' | 'NOT_LIKE%' | '%NOT_LIKE'

/**
 * Every operator understood by the comparator engine
 */
export type ComparisonOperator =
  | EqualityOperator
  | OrderingOperator
  | RangeOperator
  | MembershipOperator
  | LikeOperator

export const COMPARISON_OPERATORS: readonly ComparisonOperator[] = [
  '=',
  '==',
  '===',
  '!=',
  '<>',
  '!==',
  '>',
  '<',
  '>=',
  '<=',
  'BETWEEN',
  'NOT_BETWEEN',
  'IN',
  'NOT_IN',
  '%LIKE%',
  'LIKE%',
  '%LIKE',
  '%NOT_LIKE%',
  'NOT_LIKE%',
  '%NOT_LIKE',
]

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if value is one of the built-in type tags
 */
export function isTypeTag(value: unknown): value is TypeTag {
  return typeof value === 'string' && TYPE_TAGS.has(value)
}

/**
 * Check if value is a known comparison operator
 */
export function isComparisonOperator(value: unknown): value is ComparisonOperator {
  return typeof value === 'string' && COMPARISON_OPERATORS.some((operator) => operator === value)
}

/**
 * Check if value exposes a `toArray()` conversion
 */
export function isArrayable(value: unknown): value is Arrayable & object {
  return (
    value !== null &&
    typeof value === 'object' &&
    'toArray' in value &&
    typeof value.toArray === 'function'
  )
}

/**
 * Check if value is a constructor function
 */
export function isConstructor(value: unknown): value is Constructor {
  return typeof value === 'function' && typeof value.prototype === 'object' && value.prototype !== null
}

/**
 * Check if value is a plain object (created by a literal or `Object.create(null)`)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
