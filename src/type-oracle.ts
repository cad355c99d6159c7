/**
 * Type Oracle
 *
 * Resolves the expected type of a collection and decides whether an item
 * satisfies it.
 */

import {
  Type,
  isConstructor,
  isPlainObject,
  isTypeTag,
  type CollectionKey,
  type ExpectedType,
} from './types'
import { InvalidArgumentError, LiteralTypeMismatchError, TypeMismatchError } from './errors'

export const ANY: ExpectedType = { kind: 'any' }

// ============================================================================
// Resolution
// ============================================================================

/**
 * Turn the `type` option of a collection into an `ExpectedType`.
 *
 * `'double'` is accepted as an alias of `'float'`. Any string that is not a
 * type tag is taken as a class name.
 *
 * @throws InvalidArgumentError if the value cannot describe a type
 */
export function resolveExpectedType(type: unknown, isLiteralType = false): ExpectedType {
  if (isLiteralType) {
    return { kind: 'literal', value: type }
  }
  if (type === undefined || type === null || type === '' || type === Type.Any) {
    return ANY
  }
  if (type === 'double') {
    return { kind: 'scalar', tag: Type.Float }
  }
  if (isTypeTag(type)) {
    return { kind: 'scalar', tag: type }
  }
  if (isConstructor(type)) {
    return { kind: 'class', name: type.name, ctor: type }
  }
  if (typeof type === 'string') {
    return { kind: 'class', name: type }
  }
  throw new InvalidArgumentError(
    `Invalid collection type: expected a type tag, class or class name. Received: ${String(type)}`
  )
}

// ============================================================================
// Inspection
// ============================================================================

/**
 * Type tag of an item: a scalar tag, `'array'`, `'callable'`, `'object'` for
 * plain objects, or the constructor name of a class instance.
 */
export function typeTagOf(item: unknown): string {
  if (item === null || item === undefined) return Type.Null
  if (typeof item === 'string') return Type.String
  if (typeof item === 'boolean') return Type.Boolean
  if (typeof item === 'bigint') return Type.Integer
  if (typeof item === 'number') return Number.isInteger(item) ? Type.Integer : Type.Float
  if (typeof item === 'symbol') return Type.Symbol
  if (typeof item === 'function') return Type.Callable
  if (Array.isArray(item)) return Type.Array
  if (isPlainObject(item)) return Type.Object

  const name = typeof item.constructor === 'function' ? item.constructor.name : ''
  return name || Type.Object
}

/**
 * "Type" of an item under the given expectation. In literal mode this is
 * the item itself.
 */
export function typeOf(item: unknown, expected: ExpectedType): unknown {
  return expected.kind === 'literal' ? item : typeTagOf(item)
}

/**
 * How nested values are compared. `strict` wants keys in the same order and
 * identical scalars; `loose` ignores key order and coerces scalars (`1 == '1'`).
 */
export type EqualityMode = 'strict' | 'loose'

type VisitedPairs = Array<[object, object]>

/**
 * Structural equality. Arrays compare by index, plain objects and class
 * instances by their own enumerable keys, maps by their entries, sets by
 * their members and dates by time.
 */
export function structurallyEqual(a: unknown, b: unknown, mode: EqualityMode = 'strict'): boolean {
  return equalValues(a, b, mode, [])
}

function isObjectLike(value: unknown): value is object {
  return value !== null && typeof value === 'object'
}

function equalValues(a: unknown, b: unknown, mode: EqualityMode, visited: VisitedPairs): boolean {
  if (a === b) return true
  if (!isObjectLike(a) || !isObjectLike(b)) {
    return mode === 'loose' && !isObjectLike(a) && !isObjectLike(b) && a == b
  }
  // a cycle already being compared counts as equal
  if (visited.some(([left, right]) => left === a && right === b)) {
    return true
  }
  visited.push([a, b])
  const result = equalObjects(a, b, mode, visited)
  visited.pop()
  return result
}

function equalSequences(a: unknown[], b: unknown[], mode: EqualityMode, visited: VisitedPairs): boolean {
  return a.length === b.length && a.every((value, i) => equalValues(value, b[i], mode, visited))
}

function equalObjects(a: object, b: object, mode: EqualityMode, visited: VisitedPairs): boolean {
  if (a instanceof Date || b instanceof Date) {
    return a instanceof Date && b instanceof Date && a.getTime() === b.getTime()
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    return Array.isArray(a) && Array.isArray(b) && equalSequences(a, b, mode, visited)
  }
  if (a instanceof Map || b instanceof Map) {
    if (!(a instanceof Map && b instanceof Map) || a.size !== b.size) return false
    if (mode === 'strict') {
      const right = Array.from(b)
      return Array.from(a).every(
        ([key, value], i) => Object.is(key, right[i][0]) && equalValues(value, right[i][1], mode, visited)
      )
    }
    return Array.from(a).every(([key, value]) => b.has(key) && equalValues(value, b.get(key), mode, visited))
  }
  if (a instanceof Set || b instanceof Set) {
    if (!(a instanceof Set && b instanceof Set) || a.size !== b.size) return false
    if (mode === 'strict') {
      return equalSequences(Array.from(a), Array.from(b), mode, visited)
    }
    const members = Array.from(b)
    return Array.from(a).every((value) => members.some((member) => equalValues(value, member, mode, visited)))
  }
  if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) {
    return false
  }

  const keys = Object.keys(a)
  const otherKeys = Object.keys(b)
  if (keys.length !== otherKeys.length) return false
  if (mode === 'strict') {
    return keys.every(
      (key, i) => key === otherKeys[i] && equalValues(Reflect.get(a, key), Reflect.get(b, key), mode, visited)
    )
  }
  return keys.every(
    (key) =>
      Object.prototype.hasOwnProperty.call(b, key) &&
      equalValues(Reflect.get(a, key), Reflect.get(b, key), mode, visited)
  )
}

function inheritsFromClassNamed(item: unknown, name: string): boolean {
  if (item === null || typeof item !== 'object') {
    return false
  }
  let proto: object | null = Object.getPrototypeOf(item)
  while (proto !== null) {
    if (Object.prototype.hasOwnProperty.call(proto, 'constructor') && proto.constructor.name === name) {
      return true
    }
    proto = Object.getPrototypeOf(proto)
  }
  return false
}

/**
 * Check an item against an expected type
 */
export function isValid(item: unknown, expected: ExpectedType): boolean {
  switch (expected.kind) {
    case 'any':
      return true
    case 'literal':
      return structurallyEqual(item, expected.value, 'strict')
    case 'scalar':
      // 'object' accepts class instances too, not only plain objects
      if (expected.tag === Type.Object) {
        return item !== null && typeof item === 'object' && !Array.isArray(item)
      }
      return typeTagOf(item) === expected.tag
    case 'class':
      if (expected.ctor) {
        return item instanceof expected.ctor
      }
      return typeTagOf(item) === expected.name || inheritsFromClassNamed(item, expected.name)
  }
}

// ============================================================================
// Rendering
// ============================================================================

function renderLiteral(value: unknown): string {
  if (typeof value === 'bigint') return `${value}`
  const ancestors: unknown[] = []
  const json = JSON.stringify(value, function (this: unknown, _key: string, current: unknown): unknown {
    while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) {
      ancestors.pop()
    }
    if (typeof current === 'bigint') return `${current}`
    if (!isObjectLike(current)) return current
    if (ancestors.includes(current)) return '[Circular]'
    ancestors.push(current)
    if (current instanceof Map || current instanceof Set) {
      const members = Array.from(current)
      ancestors.push(members)
      return members
    }
    return current
  })
  return json === undefined ? String(value) : json
}

/**
 * Human readable form of an expected type, as used in error messages
 */
export function describeType(expected: ExpectedType): string {
  switch (expected.kind) {
    case 'any':
      return Type.Any
    case 'scalar':
      return expected.tag
    case 'class':
      return expected.name
    case 'literal':
      return renderLiteral(expected.value)
  }
}

/**
 * Human readable "actual type" of an item under the given expectation
 */
export function describeItem(item: unknown, expected: ExpectedType): string {
  return expected.kind === 'literal' ? renderLiteral(item) : typeTagOf(item)
}

/**
 * Whether two expected types describe the same constraint
 */
export function sameExpectedType(a: ExpectedType, b: ExpectedType): boolean {
  if (a.kind === 'class' && b.kind === 'class' && a.ctor && b.ctor) {
    return a.ctor === b.ctor
  }
  if (a.kind === 'literal' && b.kind === 'literal') {
    return structurallyEqual(a.value, b.value)
  }
  return a.kind === b.kind && describeType(a) === describeType(b)
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Assert that an item satisfies the expected type.
 *
 * @throws TypeMismatchError, or LiteralTypeMismatchError in literal mode
 */
export function validateItemType(item: unknown, expected: ExpectedType, key?: CollectionKey): void {
  if (isValid(item, expected)) {
    return
  }
  const expectedType = describeType(expected)
  const actualType = describeItem(item, expected)
  if (expected.kind === 'literal') {
    throw new LiteralTypeMismatchError(expectedType, actualType, key)
  }
  throw new TypeMismatchError(expectedType, actualType, key)
}
