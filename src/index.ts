/**
 * typed-collections
 *
 * Runtime type-checked collections over ordered key/value entries
 *
 * Provides:
 * - An expected item type checked on construction and on every mutation
 *   (type tag, class, or literal value)
 * - `where*` filters with comparison, range, membership and LIKE operators
 * - `unique()` and diff/intersect/merge set algebra
 * - Mutable collections that change in place, and immutable ones that
 *   return a modified copy from every operation
 *
 * @example
 * ```typescript
 * const people = collection<Person>(rows, Person)
 *
 * const adults = people
 *   .where('age', '>=', 18)
 *   .whereLike('name', 'a%')
 *   .unique('email')
 * ```
 *
 * @packageDocumentation
 */

// Types
export type {
  Arrayable,
  Column,
  CollectionKey,
  CollectionOptions,
  Comparator,
  ComparisonOperator,
  Constructor,
  Entry,
  EqualityOperator,
  ExpectedType,
  ItemShape,
  LikeOperator,
  MembershipOperator,
  OrderingOperator,
  Predicate,
  RangeOperator,
  SerializedCollection,
  TypeTag,
} from './types'

// Type tags, operators & type guards
export {
  Type,
  COMPARISON_OPERATORS,
  isTypeTag,
  isComparisonOperator,
  isArrayable,
  isConstructor,
  isPlainObject,
} from './types'

// Errors
export {
  CollectionError,
  TypeMismatchError,
  LiteralTypeMismatchError,
  ItemNotFoundError,
  FieldNotFoundError,
  UnsupportedItemTypeError,
  ImmutableCollectionError,
  CollectionTypeMismatchError,
  InvalidOperatorError,
  InvalidArgumentError,
  isCollectionError,
  type CollectionErrorCode,
} from './errors'

// Type oracle
export {
  ANY,
  resolveExpectedType,
  typeTagOf,
  typeOf,
  isValid,
  describeType,
  describeItem,
  sameExpectedType,
  structurallyEqual,
  type EqualityMode,
  validateItemType,
} from './type-oracle'

// Field extraction
export { classifyItem, extract, extractDotted, isStringable } from './extract'

// Comparator engine
export {
  evaluate,
  compareValues,
  looseEquals,
  includesValue,
  likeOperator,
  resolveOperator,
  createFilterPredicate,
  defaultComparator,
  objectIdentity,
} from './filter'

// Validation utilities
export {
  normalizeKey,
  validateCollectionOptions,
  validateChunkSize,
  validateSliceBounds,
  validateCombineKeys,
  isValidNonNegativeInteger,
  isValidPositiveInteger,
} from './validation'

// Collection
export { Collection, collection, type CollectionSource, type UniqueResolver } from './collection'
