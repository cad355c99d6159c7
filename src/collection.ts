/**
 * Collection
 *
 * Ordered key/value store with runtime type checking and a predicate based
 * query facility.
 *
 * Every operation that changes the entries goes through `commit()`: a mutable
 * collection is rewritten in place and returned, an immutable one is left
 * untouched and a duplicate holding the new entries is returned. Object
 * entries are shared by reference between a collection and its duplicates.
 */

import type {
  Arrayable,
  Column,
  CollectionKey,
  CollectionOptions,
  Comparator,
  ComparisonOperator,
  Entry,
  ExpectedType,
  Predicate,
  SerializedCollection,
} from './types'
import { Type, isArrayable, isConstructor } from './types'
import {
  CollectionTypeMismatchError,
  FieldNotFoundError,
  ImmutableCollectionError,
  InvalidArgumentError,
  ItemNotFoundError,
  UnsupportedItemTypeError,
} from './errors'
import {
  ANY,
  describeType,
  resolveExpectedType,
  sameExpectedType,
  validateItemType,
} from './type-oracle'
import { extract, extractDotted, isStringable } from './extract'
import {
  createFilterPredicate,
  defaultComparator,
  includesValue,
  likeOperator,
  looseEquals,
  resolveOperator,
} from './filter'
import {
  normalizeKey,
  validateChunkSize,
  validateCollectionOptions,
  validateCombineKeys,
  validateSliceBounds,
} from './validation'

/**
 * What a collection can be built from: an array (keys 0..n-1), a plain
 * object, a `Map`, another collection (keys are kept) or any value exposing
 * `toArray()`, which is read through its array form.
 */
export type CollectionSource<T> =
  | readonly T[]
  | Record<string, T>
  | Map<CollectionKey, T>
  | Collection<T>
  | Arrayable<T>

/**
 * Receives the items of a collection and returns the ones `unique()` keeps
 */
export type UniqueResolver<T> = (items: T[]) => T[]

// ============================================================================
// Entry Helpers
// ============================================================================

function toEntryMap<T>(items: CollectionSource<T> | undefined): Map<CollectionKey, T> {
  const map = new Map<CollectionKey, T>()
  if (items === undefined) {
    return map
  }
  if (items instanceof Collection) {
    for (const [key, value] of items.entries()) {
      map.set(key, value)
    }
    return map
  }
  if (items instanceof Map) {
    for (const [key, value] of items) {
      map.set(normalizeKey(key), value)
    }
    return map
  }
  if (isArrayableSource(items)) {
    return toEntryMap<T>(items.toArray())
  }
  for (const [key, value] of Object.entries(items)) {
    map.set(normalizeKey(key), value)
  }
  return map
}

/**
 * Next integer key: one more than the largest integer key, 0 when there is none
 */
function nextIndex(map: Map<CollectionKey, unknown>): number {
  let max = -1
  for (const key of map.keys()) {
    if (typeof key === 'number' && key > max) {
      max = key
    }
  }
  return max + 1
}

/**
 * Concatenate entry lists: integer keys are renumbered from 0 in order,
 * string keys are kept and later ones overwrite earlier ones.
 */
function mergeEntries<T>(...lists: Array<Iterable<Entry<T>>>): Map<CollectionKey, T> {
  const result = new Map<CollectionKey, T>()
  let next = 0
  for (const list of lists) {
    for (const [key, value] of list) {
      if (typeof key === 'number') {
        result.set(next++, value)
      } else {
        result.set(key, value)
      }
    }
  }
  return result
}

function lookup<T>(map: Map<CollectionKey, T>, key: CollectionKey): { found: true; value: T } | { found: false } {
  const value = map.get(key)
  if (value !== undefined) {
    return { found: true, value }
  }
  if (!map.has(key)) {
    return { found: false }
  }
  // the stored value itself is undefined
  for (const [k, v] of map) {
    if (k === key) return { found: true, value: v }
  }
  return { found: false }
}

function isArrayableSource<T>(items: CollectionSource<T>): items is Arrayable<T> {
  return isArrayable(items)
}

function chunkList<U>(list: U[], size: number): U[][] {
  const chunks: U[][] = []
  for (let i = 0; i < list.length; i += size) {
    chunks.push(list.slice(i, i + size))
  }
  return chunks
}

function toPlain(value: unknown): unknown {
  return isArrayable(value) ? value.toArray() : value
}

function toColumn(value: unknown): Column {
  if (value === null || value === undefined || typeof value === 'string') {
    return value
  }
  throw new InvalidArgumentError(`Invalid column: must be a string. Received: ${String(value)}`)
}

function isPredicate<T>(value: unknown): value is Predicate<T> {
  return typeof value === 'function'
}

// ============================================================================
// Collection
// ============================================================================

/**
 * Typed, ordered collection of entries
 *
 * @example
 * ```typescript
 * const users = new Collection<User>([alice, bob], { type: User })
 * const admins = users.where('role', 'admin').unique('email')
 *
 * const ids = new Collection([1, 2, 3], { type: Type.Integer, mutable: true })
 * ids.append(4) // same instance, now holding 4 items
 * ```
 */
export class Collection<T = unknown> implements Arrayable, Iterable<T> {
  private items: Map<CollectionKey, T>
  private expected: ExpectedType

  /** Whether the expected type is a literal value every item must equal */
  readonly isLiteralType: boolean

  /** Whether operations rewrite this instance instead of returning copies */
  readonly isMutable: boolean

  constructor(items?: CollectionSource<T>, options: CollectionOptions = {}) {
    validateCollectionOptions(options)
    this.isLiteralType = options.literal ?? false
    this.isMutable = options.mutable ?? false
    this.expected = resolveExpectedType(options.type, this.isLiteralType)
    this.items = toEntryMap(items)
    this.validate()
  }

  // ==========================================================================
  // Construction & Serialization
  // ==========================================================================

  /**
   * Rebuild a collection from ordered `[key, value]` pairs, as produced by `toEntries()`
   */
  static fromEntries<T>(entries: Iterable<Entry<T>>, options: CollectionOptions = {}): Collection<T> {
    const map = new Map<CollectionKey, T>()
    for (const [key, value] of entries) {
      map.set(normalizeKey(key), value)
    }
    return new Collection<T>(map, options)
  }

  /**
   * Build a collection from any value exposing `toArray()`
   */
  static fromArrayable<T>(source: Arrayable<T>, options: CollectionOptions = {}): Collection<T> {
    return new Collection<T>(source, options)
  }

  /**
   * Rebuild a collection from the output of `serialize()`
   */
  static unserialize(data: SerializedCollection): Collection<unknown> {
    return Collection.fromEntries<unknown>(data.entries, {
      type: data.type,
      literal: data.literal,
      mutable: data.mutable,
    })
  }

  /**
   * Plain form of the collection.
   *
   * @throws InvalidArgumentError if the expected type is a class constructor
   */
  serialize(): SerializedCollection {
    const type = this.getType()
    if (isConstructor(type) && !this.isLiteralType) {
      throw new InvalidArgumentError(`Cannot serialize a collection typed by class [${describeType(this.expected)}]`)
    }
    return {
      type,
      literal: this.isLiteralType,
      mutable: this.isMutable,
      entries: this.toEntries(),
    }
  }

  /**
   * Values re-indexed from 0, with nested `toArray()` capable items converted
   */
  toArray(): unknown[] {
    return Array.from(this.items.values(), toPlain)
  }

  /**
   * Ordered `[key, value]` pairs, with nested `toArray()` capable items converted
   */
  toEntries(): Array<Entry<unknown>> {
    return Array.from(this.items, ([key, value]): Entry<unknown> => [key, toPlain(value)])
  }

  toJSON(): Array<Entry<unknown>> {
    return this.toEntries()
  }

  // ==========================================================================
  // Type
  // ==========================================================================

  /**
   * The `type` this collection checks against: a type tag, `'mixed'`, a class
   * (constructor or name), or the literal value.
   */
  getType(): unknown {
    switch (this.expected.kind) {
      case 'any':
        return describeType(this.expected)
      case 'scalar':
        return this.expected.tag
      case 'class':
        return this.expected.ctor ?? this.expected.name
      case 'literal':
        return this.expected.value
    }
  }

  get expectedType(): ExpectedType {
    return this.expected
  }

  private validate(): void {
    for (const [key, item] of this.items) {
      validateItemType(item, this.expected, key)
    }
  }

  /**
   * @throws CollectionTypeMismatchError if the other collection checks a different type
   */
  private validateCollectionType<U>(other: Collection<U>): void {
    if (this.isLiteralType !== other.isLiteralType) {
      throw new CollectionTypeMismatchError(
        describeType(this.expected),
        describeType(other.expected),
        'Collection type mismatch, one expects a literal type.'
      )
    }
    if (!sameExpectedType(this.expected, other.expected)) {
      throw new CollectionTypeMismatchError(describeType(this.expected), describeType(other.expected))
    }
  }

  private combinedType<U>(other: Collection<U>): ExpectedType {
    return this.isLiteralType === other.isLiteralType && sameExpectedType(this.expected, other.expected)
      ? this.expected
      : ANY
  }

  // ==========================================================================
  // Mutation Strategy
  // ==========================================================================

  /**
   * Apply new entries: in place when mutable, on a duplicate otherwise
   */
  private commit(items: Map<CollectionKey, T>, expected: ExpectedType = this.expected): Collection<T> {
    if (this.isMutable) {
      this.items = items
      this.expected = expected
      return this
    }
    const copy = new Collection<T>(undefined, { literal: this.isLiteralType, mutable: false })
    copy.items = items
    copy.expected = expected
    return copy
  }

  // ==========================================================================
  // Access
  // ==========================================================================

  count(): number {
    return this.items.size
  }

  get size(): number {
    return this.items.size
  }

  isEmpty(): boolean {
    return this.items.size === 0
  }

  /**
   * @throws ItemNotFoundError if there is no entry under the key
   */
  get(key: CollectionKey): T {
    const entry = lookup(this.items, normalizeKey(key))
    if (!entry.found) {
      throw new ItemNotFoundError(key)
    }
    return entry.value
  }

  /**
   * Store a value under a key, or append it when the key is empty.
   *
   * @throws TypeMismatchError if the value does not satisfy the expected type
   * @throws ImmutableCollectionError if the collection is not mutable
   */
  set(key: CollectionKey | null | undefined, value: T): void {
    const normalized = key === null || key === undefined || key === '' ? nextIndex(this.items) : normalizeKey(key)
    validateItemType(value, this.expected, normalized)
    if (!this.isMutable) {
      throw new ImmutableCollectionError('set an item of')
    }
    this.items.set(normalized, value)
  }

  hasKey(key: CollectionKey): boolean {
    return this.items.has(normalizeKey(key))
  }

  /**
   * Whether any item loosely equals the value
   */
  has(value: unknown): boolean {
    for (const item of this.items.values()) {
      if (looseEquals(item, value)) {
        return true
      }
    }
    return false
  }

  first(): T | null {
    for (const item of this.items.values()) {
      return item
    }
    return null
  }

  last(): T | null {
    let last: T | null = null
    for (const item of this.items.values()) {
      last = item
    }
    return last
  }

  /**
   * Item at an integer key. Returns null when absent, unless `strict`.
   *
   * @throws ItemNotFoundError if strict and there is no item at the position
   */
  index(position: number, strict = false): T | null {
    const entry = lookup(this.items, position)
    if (entry.found) {
      return entry.value
    }
    if (strict) {
      throw new ItemNotFoundError(position)
    }
    return null
  }

  entries(): Iterable<Entry<T>> {
    return this.items.entries()
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items.values()
  }

  forEach(callback: (item: T, key: CollectionKey) => void): void {
    for (const [key, item] of this.items) {
      callback(item, key)
    }
  }

  keys(): Collection<CollectionKey> {
    return new Collection<CollectionKey>(Array.from(this.items.keys()))
  }

  values(): Collection<T> {
    return new Collection<T>(Array.from(this.items.values()))
  }

  // ==========================================================================
  // Mutation
  // ==========================================================================

  /**
   * @throws TypeMismatchError if the item does not satisfy the expected type
   */
  append(item: T): Collection<T> {
    const key = nextIndex(this.items)
    validateItemType(item, this.expected, key)
    const items = new Map(this.items)
    items.set(key, item)
    return this.commit(items)
  }

  /**
   * Add an item in front. Integer keys are renumbered from 0, string keys are kept.
   *
   * @throws TypeMismatchError if the item does not satisfy the expected type
   */
  prepend(item: T): Collection<T> {
    validateItemType(item, this.expected, 0)
    return this.commit(mergeEntries<T>([[0, item]], this.items))
  }

  unset(key: CollectionKey): Collection<T> {
    const items = new Map(this.items)
    items.delete(normalizeKey(key))
    return this.commit(items)
  }

  /**
   * Replace the keys with the given sequence, in order.
   *
   * @throws InvalidArgumentError if the number of keys differs from the number of items
   */
  combine(keys: Iterable<CollectionKey>): Collection<T> {
    const list = Array.from(keys)
    validateCombineKeys(list, this.items.size)
    const items = new Map<CollectionKey, T>()
    let i = 0
    for (const value of this.items.values()) {
      items.set(normalizeKey(list[i++]), value)
    }
    return this.commit(items)
  }

  /**
   * Transform every item. With `checkType` each result must still satisfy the
   * expected type; without it the collection becomes `mixed`.
   *
   * @throws TypeMismatchError if checkType and a result has the wrong type
   */
  map(transform: (item: T, key: CollectionKey) => T, checkType = true): Collection<T> {
    const items = new Map<CollectionKey, T>()
    for (const [key, item] of this.items) {
      const result = transform(item, key)
      if (checkType) {
        validateItemType(result, this.expected, key)
      }
      items.set(key, result)
    }
    return this.commit(items, checkType ? this.expected : ANY)
  }

  reverse(preserveKeys = false): Collection<T> {
    const reversed = Array.from(this.items).reverse()
    return this.commit(preserveKeys ? new Map(reversed) : mergeEntries(reversed))
  }

  /**
   * Entries from `offset` (negative counts from the end), `length` entries long
   * (negative stops that many from the end).
   */
  slice(offset: number, length?: number | null, preserveKeys = false): Collection<T> {
    validateSliceBounds(offset, length)
    const all = Array.from(this.items)
    const total = all.length
    const start = offset < 0 ? Math.max(total + offset, 0) : Math.min(offset, total)
    let end = total
    if (length !== undefined && length !== null) {
      end = length < 0 ? Math.max(total + length, start) : Math.min(start + length, total)
    }
    const sliced = all.slice(start, end)
    return this.commit(preserveKeys ? new Map(sliced) : mergeEntries(sliced))
  }

  /**
   * Swap keys and values. The old keys become the items and are checked
   * against the expected type; a repeated value keeps the last key.
   *
   * @throws InvalidArgumentError if a value cannot be used as a key
   * @throws TypeMismatchError if an old key does not satisfy the expected type
   */
  flip(this: Collection<CollectionKey>): Collection<CollectionKey> {
    const items = new Map<CollectionKey, CollectionKey>()
    for (const [key, value] of this.items) {
      items.set(normalizeKey(value), key)
    }
    for (const [key, value] of items) {
      validateItemType(value, this.expected, key)
    }
    return this.commit(items)
  }

  // ==========================================================================
  // Filtering
  // ==========================================================================

  filter(predicate: Predicate<T>): Collection<T> {
    const items = new Map<CollectionKey, T>()
    for (const [key, item] of this.items) {
      if (predicate(item, key)) {
        items.set(key, item)
      }
    }
    return this.commit(items)
  }

  /**
   * Filter by a predicate, by equality of the item itself, by equality of a
   * column, or by a column and an explicit operator.
   *
   * @example
   * ```typescript
   * numbers.where(5)                  // items equal to 5
   * users.where('age', 30)            // same as where('age', '=', 30)
   * users.where('age', '>=', 18)
   * users.where((user) => user.active)
   * ```
   */
  where(predicate: Predicate<T>): Collection<T>
  where(value: unknown): Collection<T>
  where(column: Column, value: unknown): Collection<T>
  where(column: Column, operator: ComparisonOperator | null | undefined | '', value: unknown): Collection<T>
  where(...args: unknown[]): Collection<T> {
    if (args.length === 0) {
      throw new InvalidArgumentError('where() expects at least one argument')
    }
    if (args.length === 1) {
      const [first] = args
      if (isPredicate<T>(first)) {
        return this.filter(first)
      }
      return this.filter(createFilterPredicate<T>(null, '=', first))
    }
    if (args.length === 2) {
      return this.filter(createFilterPredicate<T>(toColumn(args[0]), '=', args[1]))
    }
    return this.filter(createFilterPredicate<T>(toColumn(args[0]), resolveOperator(args[1]), args[2]))
  }

  /**
   * Filter by a LIKE pattern: `%abc%` or `abc` contains, `abc%` starts with,
   * `%abc` ends with. Case-insensitive unless `strict`.
   */
  whereLike(column: Column, pattern: string, strict = false): Collection<T> {
    const { operator, search } = likeOperator(pattern)
    return this.filter(createFilterPredicate<T>(column, operator, search, strict))
  }

  whereNotLike(column: Column, pattern: string, strict = false): Collection<T> {
    const { operator, search } = likeOperator(pattern, true)
    return this.filter(createFilterPredicate<T>(column, operator, search, strict))
  }

  whereNull(column?: Column): Collection<T> {
    return this.filter(createFilterPredicate<T>(column, '=', null))
  }

  whereNotNull(column?: Column): Collection<T> {
    return this.filter(createFilterPredicate<T>(column, '!=', null))
  }

  whereBetween(column: Column, lowerBound: unknown, upperBound: unknown): Collection<T> {
    return this.filter(createFilterPredicate<T>(column, 'BETWEEN', [lowerBound, upperBound]))
  }

  whereNotBetween(column: Column, lowerBound: unknown, upperBound: unknown): Collection<T> {
    return this.filter(createFilterPredicate<T>(column, 'NOT_BETWEEN', [lowerBound, upperBound]))
  }

  whereIn(column: Column, values: Iterable<unknown>, strict = false): Collection<T> {
    return this.filter(createFilterPredicate<T>(column, 'IN', Array.from(values), strict))
  }

  whereNotIn(column: Column, values: Iterable<unknown>, strict = false): Collection<T> {
    return this.filter(createFilterPredicate<T>(column, 'NOT_IN', Array.from(values), strict))
  }

  /**
   * Keep the first item of every distinct value. The value is the item itself
   * when it is stringable or no column is given, otherwise the (dotted) column.
   *
   * A resolver function receives all items and returns those to keep; the
   * result is re-indexed from 0.
   *
   * @param throwIfFieldMissing - when false, items lacking the column are kept
   * @throws FieldNotFoundError if an item lacks the column and throwIfFieldMissing
   */
  unique(column?: string | UniqueResolver<T> | null, strict = false, throwIfFieldMissing = true): Collection<T> {
    if (typeof column === 'function') {
      const kept = column(Array.from(this.items.values()))
      kept.forEach((item, index) => validateItemType(item, this.expected, index))
      return this.commit(mergeEntries(kept.entries()))
    }

    const items = new Map<CollectionKey, T>()
    const seen: unknown[] = []
    for (const [key, item] of this.items) {
      let value: unknown
      try {
        value = isStringable(item) || column === undefined || column === null || column === '' ? item : extractDotted(item, column)
      } catch (error) {
        if (error instanceof FieldNotFoundError && !throwIfFieldMissing) {
          items.set(key, item)
          continue
        }
        throw error
      }
      if (!includesValue(seen, value, strict)) {
        items.set(key, item)
        seen.push(value)
      }
    }
    return this.commit(items)
  }

  // ==========================================================================
  // Set Algebra
  // ==========================================================================

  /**
   * Symmetric difference: items of this collection missing from the other,
   * followed by items of the other missing from this one.
   *
   * @throws CollectionTypeMismatchError if checkType and the types differ
   */
  diff(other: Collection<T>, checkType = true, comparator: Comparator = defaultComparator): Collection<T> {
    if (checkType) {
      this.validateCollectionType(other)
    }
    const mine = Array.from(this.items.values())
    const theirs = Array.from(other.items.values())
    const missingFromOther = Array.from(this.items).filter(([, value]) => !theirs.some((v) => comparator(value, v) === 0))
    const missingFromThis = Array.from(other.items).filter(([, value]) => !mine.some((v) => comparator(value, v) === 0))
    return this.commit(mergeEntries(missingFromOther, missingFromThis), this.combinedType(other))
  }

  /**
   * Like `diff()`, but an entry only matches when both its key and value do.
   * Duplicate values are dropped from the result.
   *
   * @throws CollectionTypeMismatchError if checkType and the types differ
   */
  diffAssoc(other: Collection<T>, checkType = true, comparator: Comparator = defaultComparator): Collection<T> {
    if (checkType) {
      this.validateCollectionType(other)
    }
    const matches = (source: Map<CollectionKey, T>, key: CollectionKey, value: T): boolean =>
      source.has(key) && comparator(value, source.get(key)) === 0

    const missingFromOther = Array.from(this.items).filter(([key, value]) => !matches(other.items, key, value))
    const missingFromThis = Array.from(other.items).filter(([key, value]) => !matches(this.items, key, value))

    const items = new Map<CollectionKey, T>()
    const kept: T[] = []
    for (const [key, value] of mergeEntries(missingFromOther, missingFromThis)) {
      if (!kept.some((v) => comparator(value, v) === 0)) {
        items.set(key, value)
        kept.push(value)
      }
    }
    return this.commit(items, this.combinedType(other))
  }

  /**
   * Entries of this collection whose value is also in the other. Keys are kept.
   *
   * @throws CollectionTypeMismatchError if checkType and the types differ
   */
  intersect(other: Collection<T>, checkType = true, comparator: Comparator = defaultComparator): Collection<T> {
    if (checkType) {
      this.validateCollectionType(other)
    }
    const theirs = Array.from(other.items.values())
    const items = new Map<CollectionKey, T>()
    for (const [key, value] of this.items) {
      if (theirs.some((v) => comparator(value, v) === 0)) {
        items.set(key, value)
      }
    }
    return this.commit(items, this.combinedType(other))
  }

  /**
   * Entries of this collection present in the other under the same key with an equal value
   *
   * @throws CollectionTypeMismatchError if checkType and the types differ
   */
  intersectAssoc(other: Collection<T>, checkType = true, comparator: Comparator = defaultComparator): Collection<T> {
    if (checkType) {
      this.validateCollectionType(other)
    }
    const items = new Map<CollectionKey, T>()
    for (const [key, value] of this.items) {
      if (other.items.has(key) && comparator(value, other.items.get(key)) === 0) {
        items.set(key, value)
      }
    }
    return this.commit(items, this.combinedType(other))
  }

  /**
   * Append the entries of another collection. Integer keys of both are
   * renumbered from 0, string keys of the other overwrite those of this one.
   *
   * @throws CollectionTypeMismatchError if checkType and the types differ
   */
  merge(other: Collection<T>, checkType = true): Collection<T> {
    if (checkType) {
      this.validateCollectionType(other)
    }
    return this.commit(mergeEntries(this.items, other.items), this.combinedType(other))
  }

  // ==========================================================================
  // Derived Collections & Aggregates
  // ==========================================================================

  /**
   * Split into arrays of `size` items. The result is typed `'array'`. With
   * `preserveKeys` every chunk holds the original `[key, value]` pairs.
   *
   * @throws InvalidArgumentError if size is not a positive integer
   */
  chunk(size: number, preserveKeys?: false): Collection<T[]>
  chunk(size: number, preserveKeys: true): Collection<Array<Entry<T>>>
  chunk(size: number, preserveKeys = false): Collection<T[]> | Collection<Array<Entry<T>>> {
    validateChunkSize(size)
    if (preserveKeys) {
      return new Collection<Array<Entry<T>>>(chunkList(Array.from(this.items), size), { type: Type.Array })
    }
    return new Collection<T[]>(chunkList(Array.from(this.items.values()), size), { type: Type.Array })
  }

  /**
   * Values of one column of every item, optionally keyed by another column.
   * Items lacking the column are skipped.
   */
  column(name: string, indexBy?: string): Collection<unknown> {
    const items = new Map<CollectionKey, unknown>()
    for (const item of this.items.values()) {
      const value = tryExtract(item, name)
      if (!value.found) {
        continue
      }
      const key = indexBy === undefined ? undefined : tryExtract(item, indexBy)
      if (key?.found && (typeof key.value === 'string' || typeof key.value === 'number')) {
        items.set(normalizeKey(key.value), value.value)
      } else {
        items.set(nextIndex(items), value.value)
      }
    }
    return new Collection<unknown>(items)
  }

  reduce<R>(callback: (carry: R, item: T, key: CollectionKey) => R, initial: R): R {
    let carry = initial
    for (const [key, item] of this.items) {
      carry = callback(carry, item, key)
    }
    return carry
  }

  /**
   * Sum of the numeric items. Numeric strings count as numbers, other values as 0.
   */
  sum(): number {
    return this.reduce((carry, item) => carry + toNumber(item), 0)
  }

  /**
   * Product of the numeric items; 1 for an empty collection.
   */
  product(): number {
    return this.reduce((carry, item) => carry * toNumber(item), 1)
  }
}

function tryExtract(item: unknown, column: string): { found: boolean; value?: unknown } {
  try {
    return { found: true, value: extract(item, column) }
  } catch (error) {
    if (error instanceof FieldNotFoundError || error instanceof UnsupportedItemTypeError) {
      return { found: false }
    }
    throw error
  }
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value
  if (typeof value === 'bigint' || typeof value === 'boolean') return Number(value)
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value)
    return Number.isNaN(parsed) ? 0 : parsed
  }
  return 0
}

/**
 * Factory function to create a Collection
 *
 * @example
 * ```typescript
 * const names = collection(['Ann', 'Bob'], Type.String)
 * ```
 */
export function collection<T>(
  items: CollectionSource<T> = [],
  type: unknown = 'mixed',
  isLiteralType = false,
  isMutable = false
): Collection<T> {
  return new Collection<T>(items, { type, literal: isLiteralType, mutable: isMutable })
}
