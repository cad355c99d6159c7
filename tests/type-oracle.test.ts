/**
 * Type Oracle Tests
 */

import { describe, it, expect } from 'vitest'
import {
  ANY,
  describeType,
  isValid,
  resolveExpectedType,
  sameExpectedType,
  structurallyEqual,
  typeOf,
  typeTagOf,
  validateItemType,
} from '../src/type-oracle'
import { InvalidArgumentError, LiteralTypeMismatchError, TypeMismatchError } from '../src/errors'
import { Type } from '../src/types'

class Person {
  constructor(public name: string) {}
}

class Employee extends Person {}

// ============================================================================
// resolveExpectedType
// ============================================================================

describe('resolveExpectedType', () => {
  it('treats empty values and mixed as any', () => {
    expect(resolveExpectedType(undefined)).toEqual({ kind: 'any' })
    expect(resolveExpectedType(null)).toEqual({ kind: 'any' })
    expect(resolveExpectedType('')).toEqual({ kind: 'any' })
    expect(resolveExpectedType(Type.Any)).toEqual({ kind: 'any' })
  })

  it('resolves type tags, with double as an alias of float', () => {
    expect(resolveExpectedType('integer')).toEqual({ kind: 'scalar', tag: 'integer' })
    expect(resolveExpectedType('double')).toEqual({ kind: 'scalar', tag: 'float' })
  })

  it('resolves constructors and class names', () => {
    expect(resolveExpectedType(Person)).toEqual({ kind: 'class', name: 'Person', ctor: Person })
    expect(resolveExpectedType('Person')).toEqual({ kind: 'class', name: 'Person' })
  })

  it('wraps any value in literal mode', () => {
    expect(resolveExpectedType(5, true)).toEqual({ kind: 'literal', value: 5 })
    expect(resolveExpectedType(undefined, true)).toEqual({ kind: 'literal', value: undefined })
  })

  it('rejects values that cannot describe a type', () => {
    expect(() => resolveExpectedType(42)).toThrow(InvalidArgumentError)
  })
})

// ============================================================================
// typeTagOf
// ============================================================================

describe('typeTagOf', () => {
  it('tags scalars', () => {
    expect(typeTagOf(null)).toBe('null')
    expect(typeTagOf(undefined)).toBe('null')
    expect(typeTagOf('a')).toBe('string')
    expect(typeTagOf(1)).toBe('integer')
    expect(typeTagOf(1.5)).toBe('float')
    expect(typeTagOf(10n)).toBe('integer')
    expect(typeTagOf(true)).toBe('boolean')
  })

  it('tags arrays, functions and objects', () => {
    expect(typeTagOf([])).toBe('array')
    expect(typeTagOf(() => 1)).toBe('callable')
    expect(typeTagOf({})).toBe('object')
    expect(typeTagOf(Object.create(null))).toBe('object')
  })

  it('uses the constructor name of class instances', () => {
    expect(typeTagOf(new Date(0))).toBe('Date')
    expect(typeTagOf(new Employee('Ann'))).toBe('Employee')
  })
})

describe('typeOf', () => {
  it('returns the type tag, or the item itself in literal mode', () => {
    expect(typeOf(5, ANY)).toBe('integer')
    expect(typeOf(new Person('Ann'), resolveExpectedType(Person))).toBe('Person')
    expect(typeOf(5, resolveExpectedType(5, true))).toBe(5)
  })
})

// ============================================================================
// structurallyEqual
// ============================================================================

describe('structurallyEqual', () => {
  it('compares maps by their entries', () => {
    expect(structurallyEqual(new Map([['a', 1]]), new Map([['a', 1]]))).toBe(true)
    expect(structurallyEqual(new Map([['a', 1]]), new Map([['b', 2]]))).toBe(false)
    expect(structurallyEqual(new Map([['a', 1]]), new Map([['a', 2]]))).toBe(false)
    expect(structurallyEqual(new Map(), {})).toBe(false)
  })

  it('compares sets by their members', () => {
    expect(structurallyEqual(new Set([1, 2]), new Set([1, 2]))).toBe(true)
    expect(structurallyEqual(new Set([1, 2]), new Set([2, 1]))).toBe(false)
    expect(structurallyEqual(new Set([1, 2]), new Set([2, 1]), 'loose')).toBe(true)
    expect(structurallyEqual(new Set([1]), new Set([2]), 'loose')).toBe(false)
  })

  it('respects key order only in strict mode', () => {
    expect(structurallyEqual({ a: 1, b: 2 }, { b: 2, a: 1 })).toBe(false)
    expect(structurallyEqual({ a: 1, b: 2 }, { b: 2, a: 1 }, 'loose')).toBe(true)
    expect(structurallyEqual(new Map([['a', 1], ['b', 2]]), new Map([['b', 2], ['a', 1]]), 'loose')).toBe(true)
  })

  it('coerces nested scalars only in loose mode', () => {
    expect(structurallyEqual({ a: 1 }, { a: '1' })).toBe(false)
    expect(structurallyEqual({ a: 1 }, { a: '1' }, 'loose')).toBe(true)
    expect(structurallyEqual([1], 1, 'loose')).toBe(false)
  })

  it('handles nested bigints', () => {
    expect(structurallyEqual({ n: 1n }, { n: 1n })).toBe(true)
    expect(structurallyEqual({ n: 1n }, { n: 2n })).toBe(false)
  })

  it('handles circular references', () => {
    const left: Record<string, unknown> = { name: 'x' }
    left.self = left
    const right: Record<string, unknown> = { name: 'x' }
    right.self = right
    expect(structurallyEqual(left, right)).toBe(true)
  })

  it('requires the same prototype', () => {
    expect(structurallyEqual(new Person('Ann'), { name: 'Ann' })).toBe(false)
    expect(structurallyEqual(new Person('Ann'), new Person('Ann'))).toBe(true)
  })
})

// ============================================================================
// isValid
// ============================================================================

describe('isValid', () => {
  it('accepts anything under any', () => {
    expect(isValid(Symbol('x'), ANY)).toBe(true)
  })

  it('accepts any non-array object for the object tag', () => {
    const object = resolveExpectedType('object')
    expect(isValid({}, object)).toBe(true)
    expect(isValid(new Person('Ann'), object)).toBe(true)
    expect(isValid([], object)).toBe(false)
    expect(isValid(null, object)).toBe(false)
  })

  it('distinguishes integers from floats', () => {
    expect(isValid(2, resolveExpectedType('integer'))).toBe(true)
    expect(isValid(2.5, resolveExpectedType('integer'))).toBe(false)
    expect(isValid(2.5, resolveExpectedType('float'))).toBe(true)
  })

  it('checks constructors with instanceof', () => {
    const person = resolveExpectedType(Person)
    expect(isValid(new Employee('Bo'), person)).toBe(true)
    expect(isValid({ name: 'Bo' }, person)).toBe(false)
  })

  it('checks class names along the prototype chain', () => {
    const person = resolveExpectedType('Person')
    expect(isValid(new Employee('Bo'), person)).toBe(true)
    expect(isValid(new Date(0), person)).toBe(false)
  })

  it('compares literals structurally', () => {
    const literal = resolveExpectedType({ a: 1 }, true)
    expect(isValid({ a: 1 }, literal)).toBe(true)
    expect(isValid({ a: 2 }, literal)).toBe(false)
  })

  it('tells map literals apart', () => {
    const literal = resolveExpectedType(new Map([['a', 1]]), true)
    expect(isValid(new Map([['a', 1]]), literal)).toBe(true)
    expect(isValid(new Map([['b', 2]]), literal)).toBe(false)
  })
})

// ============================================================================
// Rendering & validation
// ============================================================================

describe('describeType', () => {
  it('renders each kind of expected type', () => {
    expect(describeType(ANY)).toBe('mixed')
    expect(describeType(resolveExpectedType('string'))).toBe('string')
    expect(describeType(resolveExpectedType(Person))).toBe('Person')
    expect(describeType(resolveExpectedType({ a: 1 }, true))).toBe('{"a":1}')
  })

  it('renders literals holding bigints, maps and cycles', () => {
    expect(describeType(resolveExpectedType({ n: 1n }, true))).toBe('{"n":"1"}')
    expect(describeType(resolveExpectedType(new Map([['a', 1]]), true))).toBe('[["a",1]]')

    const node: Record<string, unknown> = { name: 'x' }
    node.self = node
    expect(describeType(resolveExpectedType(node, true))).toBe('{"name":"x","self":"[Circular]"}')
  })
})

describe('sameExpectedType', () => {
  it('compares constructors by identity and others by description', () => {
    expect(sameExpectedType(resolveExpectedType(Person), resolveExpectedType(Person))).toBe(true)
    expect(sameExpectedType(resolveExpectedType(Person), resolveExpectedType(Employee))).toBe(false)
    expect(sameExpectedType(resolveExpectedType('double'), resolveExpectedType('float'))).toBe(true)
    expect(sameExpectedType(resolveExpectedType('a', true), resolveExpectedType('a', true))).toBe(true)
    expect(sameExpectedType(resolveExpectedType('string'), ANY)).toBe(false)
  })
})

describe('validateItemType', () => {
  it('passes valid items', () => {
    expect(() => validateItemType(3, resolveExpectedType('integer'), 0)).not.toThrow()
  })

  it('throws TypeMismatchError naming the key and both types', () => {
    expect(() => validateItemType('x', resolveExpectedType('integer'), 2)).toThrow(
      'Invalid item type encountered at key [2], expecting type of [integer], [string] given.'
    )
    expect(() => validateItemType('x', resolveExpectedType('integer'))).toThrow(TypeMismatchError)
  })

  it('throws LiteralTypeMismatchError in literal mode', () => {
    let caught: unknown
    try {
      validateItemType('b', resolveExpectedType('a', true), 0)
    } catch (error) {
      caught = error
    }
    expect(caught).toBeInstanceOf(LiteralTypeMismatchError)
    expect(caught).toBeInstanceOf(TypeMismatchError)
    expect(caught).toMatchObject({
      code: 'LITERAL_TYPE_MISMATCH',
      message: 'Invalid item type encountered at key [0], expecting literal type of ["a"], ["b"] given.',
    })
  })
})
