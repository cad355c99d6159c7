/**
 * Field Extractor
 *
 * Resolve the value a filter compares against: the item itself, one of its
 * fields, or a nested value reached through a dotted path.
 */

import { isArrayable, isPlainObject, type Column, type ItemShape } from './types'
import { FieldNotFoundError, UnsupportedItemTypeError } from './errors'
import { typeTagOf } from './type-oracle'

/**
 * Whether a value can be treated as a bare scalar for comparisons: non-symbol
 * primitives, `null`/`undefined`, and non-array objects that define their own
 * `toString()` (a `Date`, for instance).
 */
export function isStringable(value: unknown): boolean {
  if (value === null || value === undefined) return true
  if (typeof value === 'symbol' || typeof value === 'function') return false
  if (typeof value !== 'object') return true
  if (Array.isArray(value) || value instanceof Map) return false
  return value.toString !== Object.prototype.toString
}

/**
 * Classify an item for extraction. Arrays, plain objects and maps are
 * mappings; class instances are objects, or convertibles when they expose
 * `toArray()`.
 */
export function classifyItem(item: unknown): ItemShape {
  if (Array.isArray(item) || isPlainObject(item) || item instanceof Map) {
    return { kind: 'mapping', value: item }
  }
  if (isArrayable(item)) {
    return { kind: 'convertible', value: item }
  }
  if (item === null || item === undefined) {
    return { kind: 'scalar', value: item }
  }
  if (typeof item === 'object') {
    return { kind: 'object', value: item }
  }
  if (typeof item === 'string' || typeof item === 'number' || typeof item === 'bigint' || typeof item === 'boolean') {
    return { kind: 'scalar', value: item }
  }
  return { kind: 'unsupported', value: item }
}

function lookupMapping(
  mapping: Record<string, unknown> | unknown[] | Map<unknown, unknown>,
  key: string
): { found: boolean; value?: unknown } {
  if (mapping instanceof Map) {
    if (mapping.has(key)) return { found: true, value: mapping.get(key) }
    const numeric = Number(key)
    if (key !== '' && Number.isInteger(numeric) && mapping.has(numeric)) {
      return { found: true, value: mapping.get(numeric) }
    }
    return { found: false }
  }
  if (Object.prototype.hasOwnProperty.call(mapping, key)) {
    return { found: true, value: Reflect.get(mapping, key) }
  }
  return { found: false }
}

function lookupMember(target: object, key: string): { found: boolean; value?: unknown } {
  if (key in target) {
    return { found: true, value: Reflect.get(target, key) }
  }
  return { found: false }
}

/**
 * Resolve a single path segment on a non-scalar value
 */
function resolveSegment(value: unknown, segment: string, path: string): unknown {
  const shape = classifyItem(value)
  let result: { found: boolean; value?: unknown }

  switch (shape.kind) {
    case 'mapping':
      result = lookupMapping(shape.value, segment)
      break
    case 'object':
      result = lookupMember(shape.value, segment)
      break
    case 'convertible': {
      result = lookupMember(shape.value, segment)
      if (!result.found) {
        result = lookupMapping(shape.value.toArray(), segment)
      }
      break
    }
    case 'scalar':
    case 'unsupported':
      result = { found: false }
      break
  }

  if (!result.found) {
    throw new FieldNotFoundError(segment, path)
  }
  return result.value
}

function isEmptyColumn(column: Column): column is null | undefined | '' {
  return column === null || column === undefined || column === ''
}

/**
 * Resolve a top level field of an item. An empty column returns a stringable
 * item unchanged.
 *
 * @throws UnsupportedItemTypeError for scalar items with a column, and for
 * non-stringable items without one
 * @throws FieldNotFoundError if the field does not exist
 */
export function extract(item: unknown, column: Column): unknown {
  if (isEmptyColumn(column)) {
    if (isStringable(item)) return item
    throw new UnsupportedItemTypeError(null, typeTagOf(item))
  }

  const shape = classifyItem(item)
  if (shape.kind === 'scalar' || shape.kind === 'unsupported') {
    throw new UnsupportedItemTypeError(column, typeTagOf(item))
  }
  return resolveSegment(item, column, column)
}

/**
 * Resolve a period-delimited path segment by segment, e.g. `meta.owner.name`
 *
 * @throws FieldNotFoundError naming the first segment that cannot be resolved
 */
export function extractDotted(item: unknown, path: string): unknown {
  if (path === '') {
    return extract(item, path)
  }
  let value = item
  for (const segment of path.split('.')) {
    value = resolveSegment(value, segment, path)
  }
  return value
}
