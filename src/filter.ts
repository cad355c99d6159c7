/**
 * Comparator Engine
 *
 * Evaluate comparison operators against values extracted from collection
 * items, and build the predicates the `where*` methods filter with.
 */

import {
  isComparisonOperator,
  isPlainObject,
  type Column,
  type ComparisonOperator,
  type LikeOperator,
  type Predicate,
} from './types'
import { InvalidArgumentError, InvalidOperatorError } from './errors'
import { structurallyEqual, typeTagOf } from './type-oracle'
import { extract, isStringable } from './extract'

// ============================================================================
// Operator Resolution
// ============================================================================

/**
 * Resolve an operator argument. Empty operators mean equality.
 *
 * @throws InvalidOperatorError for anything that is not a known operator
 */
export function resolveOperator(operator: unknown): ComparisonOperator {
  if (operator === null || operator === undefined || operator === '') {
    return '='
  }
  if (!isComparisonOperator(operator)) {
    throw new InvalidOperatorError(operator)
  }
  return operator
}

/**
 * Pick the LIKE operator from the wildcard positions of a pattern and strip
 * the wildcards from the search string.
 *
 * - `%abc%` or `abc`: contains
 * - `abc%`: starts with
 * - `%abc`: ends with
 */
export function likeOperator(pattern: string, negate = false): { operator: LikeOperator; search: string } {
  const leading = pattern.startsWith('%')
  const trailing = pattern.length > 1 && pattern.endsWith('%')
  const search = pattern.replace(/^%+|%+$/g, '')

  if (leading && !trailing) {
    return { operator: negate ? '%NOT_LIKE' : '%LIKE', search }
  }
  if (trailing && !leading) {
    return { operator: negate ? 'NOT_LIKE%' : 'LIKE%', search }
  }
  return { operator: negate ? '%NOT_LIKE%' : '%LIKE%', search }
}

// ============================================================================
// Value Comparison
// ============================================================================

const NUMERIC_STRING = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/

function toOrderable(value: unknown): number | string | null {
  if (value === null || value === undefined) return null
  if (typeof value === 'number') return value
  if (typeof value === 'bigint') return Number(value)
  if (typeof value === 'boolean') return value ? 1 : 0
  if (value instanceof Date) return value.getTime()
  if (typeof value === 'string') return NUMERIC_STRING.test(value) ? Number(value) : value
  return String(value)
}

/**
 * Natural ordering of two values. Numbers, bigints, booleans, dates and
 * numeric strings compare numerically, `null` sorts first, everything else
 * compares by its string form.
 */
export function compareValues(a: unknown, b: unknown): number {
  const left = toOrderable(a)
  const right = toOrderable(b)

  if (left === null || right === null) {
    if (left === right) return 0
    return left === null ? -1 : 1
  }
  if (typeof left === 'number' && typeof right === 'number') {
    if (left === right) return 0
    return left < right ? -1 : 1
  }
  const l = String(left)
  const r = String(right)
  if (l === r) return 0
  return l < r ? -1 : 1
}

/**
 * Type-coercing equality. Objects are equal when they hold loosely equal
 * values under the same keys, in any order; dates when they hold the same time.
 */
export function looseEquals(a: unknown, b: unknown): boolean {
  if (a === b) return true
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime()
  if ((a !== null && typeof a === 'object') || (b !== null && typeof b === 'object')) {
    return structurallyEqual(a, b, 'loose')
  }
  return a == b
}

/**
 * Membership test by loose equality, or by strict structural equality when `strict`
 */
export function includesValue(values: readonly unknown[], value: unknown, strict = false): boolean {
  return strict
    ? values.some((candidate) => structurallyEqual(value, candidate, 'strict'))
    : values.some((candidate) => looseEquals(value, candidate))
}

function lowerCase(value: unknown): unknown {
  return typeof value === 'string' ? value.toLowerCase() : value
}

function likeString(value: unknown): string {
  return value === null || value === undefined ? '' : String(value)
}

function toBounds(search: unknown, operator: ComparisonOperator): [unknown, unknown] {
  if (!Array.isArray(search) || search.length !== 2) {
    throw new InvalidArgumentError(`${operator} expects a [lowerBound, upperBound] pair`)
  }
  return [search[0], search[1]]
}

function toValueSet(search: unknown, operator: ComparisonOperator): unknown[] {
  if (!Array.isArray(search)) {
    throw new InvalidArgumentError(`${operator} expects an array of values`)
  }
  return search
}

// ============================================================================
// Default Comparator
// ============================================================================

const identities = new WeakMap<object, number>()
let nextIdentity = 1

/**
 * Opaque identity number of an object, stable for its lifetime
 */
export function objectIdentity(value: object): number {
  let id = identities.get(value)
  if (id === undefined) {
    id = nextIdentity++
    identities.set(value, id)
  }
  return id
}

function isInstance(value: unknown): value is object {
  return (
    value !== null &&
    typeof value === 'object' &&
    !Array.isArray(value) &&
    !isPlainObject(value) &&
    !(value instanceof Map) &&
    !(value instanceof Set) &&
    !(value instanceof Date)
  )
}

/**
 * Comparator used by the set-algebra methods when none is given. Class
 * instances compare by identity, stringable values by natural ordering,
 * containers structurally. Values of different types are never equal.
 */
export function defaultComparator(a: unknown, b: unknown): number {
  const left = isInstance(a) && isInstance(b) ? objectIdentity(a) : a
  const right = isInstance(a) && isInstance(b) ? objectIdentity(b) : b

  if (isStringable(left) && isStringable(right)) {
    return compareValues(left, right)
  }
  if (typeTagOf(left) !== typeTagOf(right)) {
    return -1
  }
  return structurallyEqual(left, right) ? 0 : -1
}

function assertNever(operator: never): never {
  throw new InvalidOperatorError(operator)
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Evaluate `actual <operator> search`.
 *
 * Unless `strict` is set, string operands (and string members of an `IN` set)
 * are lower-cased first. `strict` also turns `=`/`==` and `IN` membership into
 * strict equality.
 */
export function evaluate(
  operator: ComparisonOperator,
  actual: unknown,
  search: unknown,
  strict = false
): boolean {
  let value: unknown = actual === undefined ? null : actual
  let needle = search
  if (!strict) {
    value = lowerCase(value)
    needle = Array.isArray(needle) ? needle.map(lowerCase) : lowerCase(needle)
  }

  switch (operator) {
    case '=':
    case '==':
      return strict ? value === needle : looseEquals(value, needle)
    case '===':
      return value === needle
    case '!=':
    case '<>':
    case '!==':
      return value !== needle
    case '>':
      return compareValues(value, needle) > 0
    case '<':
      return compareValues(value, needle) < 0
    case '>=':
      return compareValues(value, needle) >= 0
    case '<=':
      return compareValues(value, needle) <= 0
    case 'BETWEEN': {
      const [lower, upper] = toBounds(needle, operator)
      return compareValues(value, lower) >= 0 && compareValues(value, upper) <= 0
    }
    case 'NOT_BETWEEN': {
      const [lower, upper] = toBounds(needle, operator)
      return compareValues(value, lower) < 0 || compareValues(value, upper) > 0
    }
    case 'IN':
      return includesValue(toValueSet(needle, operator), value, strict)
    case 'NOT_IN':
      return !includesValue(toValueSet(needle, operator), value, strict)
    case '%LIKE%':
      return likeString(value).includes(likeString(needle))
    case 'LIKE%':
      return likeString(value).startsWith(likeString(needle))
    case '%LIKE':
      return likeString(value).endsWith(likeString(needle))
    case '%NOT_LIKE%':
      return !likeString(value).includes(likeString(needle))
    case 'NOT_LIKE%':
      return !likeString(value).startsWith(likeString(needle))
    case '%NOT_LIKE':
      return !likeString(value).endsWith(likeString(needle))
    default:
      return assertNever(operator)
  }
}

/**
 * Build a predicate comparing the given column of each item (or the item
 * itself when the column is empty) against `search`.
 */
export function createFilterPredicate<T>(
  column: Column,
  operator: ComparisonOperator,
  search: unknown,
  strict = false
): Predicate<T> {
  return (item: T) => evaluate(operator, extract(item, column), search, strict)
}
