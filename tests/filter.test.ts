/**
 * Comparator Engine Tests
 *
 * Tests for operator resolution, LIKE patterns, ordering and evaluation
 */

import { describe, it, expect } from 'vitest'
import {
  compareValues,
  createFilterPredicate,
  defaultComparator,
  evaluate,
  includesValue,
  likeOperator,
  looseEquals,
  resolveOperator,
} from '../src/filter'
import { InvalidArgumentError, InvalidOperatorError } from '../src/errors'
import { COMPARISON_OPERATORS } from '../src/types'

class Tag {
  constructor(public label: string) {}
}

// ============================================================================
// Operator Resolution
// ============================================================================

describe('resolveOperator', () => {
  it('defaults empty operators to equality', () => {
    expect(resolveOperator('')).toBe('=')
    expect(resolveOperator(null)).toBe('=')
    expect(resolveOperator(undefined)).toBe('=')
  })

  it('accepts every known operator', () => {
    for (const operator of COMPARISON_OPERATORS) {
      expect(resolveOperator(operator)).toBe(operator)
    }
  })

  it('rejects unknown operators', () => {
    expect(() => resolveOperator('LIKE')).toThrow(InvalidOperatorError)
    expect(() => resolveOperator('LIKE')).toThrow('Invalid comparison operator: "LIKE"')
  })
})

describe('likeOperator', () => {
  it('picks the operator from the wildcard positions', () => {
    expect(likeOperator('%o')).toEqual({ operator: '%LIKE', search: 'o' })
    expect(likeOperator('ab%')).toEqual({ operator: 'LIKE%', search: 'ab' })
    expect(likeOperator('%ab%')).toEqual({ operator: '%LIKE%', search: 'ab' })
    expect(likeOperator('ab')).toEqual({ operator: '%LIKE%', search: 'ab' })
  })

  it('negates', () => {
    expect(likeOperator('%o', true)).toEqual({ operator: '%NOT_LIKE', search: 'o' })
    expect(likeOperator('o%', true)).toEqual({ operator: 'NOT_LIKE%', search: 'o' })
    expect(likeOperator('o', true)).toEqual({ operator: '%NOT_LIKE%', search: 'o' })
  })
})

// ============================================================================
// Value Comparison
// ============================================================================

describe('compareValues', () => {
  it('compares numbers and numeric strings numerically', () => {
    expect(compareValues('10', 9)).toBe(1)
    expect(compareValues(2, '2.0')).toBe(0)
    expect(compareValues(1n, 2)).toBe(-1)
  })

  it('sorts null first', () => {
    expect(compareValues(null, 0)).toBe(-1)
    expect(compareValues(0, undefined)).toBe(1)
    expect(compareValues(null, undefined)).toBe(0)
  })

  it('compares other values by their string form', () => {
    expect(compareValues('abc', 'abd')).toBe(-1)
    expect(compareValues('b', 'a')).toBe(1)
  })

  it('compares dates by time', () => {
    expect(compareValues(new Date(1000), new Date(2000))).toBe(-1)
  })
})

describe('looseEquals / includesValue', () => {
  it('coerces scalars', () => {
    expect(looseEquals(5, '5')).toBe(true)
    expect(looseEquals('a', 'A')).toBe(false)
  })

  it('compares objects structurally and dates by time', () => {
    expect(looseEquals({ a: 1 }, { a: 1 })).toBe(true)
    expect(looseEquals(new Date(5), new Date(5))).toBe(true)
  })

  it('ignores key order and coerces nested scalars', () => {
    expect(looseEquals({ a: 1, b: 2 }, { b: 2, a: 1 })).toBe(true)
    expect(looseEquals({ a: 1 }, { a: '1' })).toBe(true)
    expect(looseEquals(new Map([['a', 1]]), new Map([['b', 1]]))).toBe(false)
    expect(looseEquals({ n: 1n }, { n: 1n })).toBe(true)
  })

  it('checks membership loosely or strictly', () => {
    expect(includesValue([{ a: 1, b: 2 }], { b: 2, a: 1 })).toBe(true)
    expect(includesValue([{ a: 1, b: 2 }], { b: 2, a: 1 }, true)).toBe(false)
    expect(includesValue([{ a: 1, b: 2 }], { a: 1, b: 2 }, true)).toBe(true)
    expect(includesValue([1, 2], '2')).toBe(true)
    expect(includesValue([1, 2], '2', true)).toBe(false)
  })
})

// ============================================================================
// Evaluation
// ============================================================================

describe('evaluate', () => {
  it('ignores case unless strict', () => {
    expect(evaluate('=', 'ABC', 'abc')).toBe(true)
    expect(evaluate('=', 'ABC', 'abc', true)).toBe(false)
  })

  it('distinguishes loose and identical equality', () => {
    expect(evaluate('==', '5', 5)).toBe(true)
    expect(evaluate('===', '5', 5)).toBe(false)
    expect(evaluate('<>', 1, 2)).toBe(true)
    expect(evaluate('!==', 1, 1)).toBe(false)
  })

  it('treats missing values as null', () => {
    expect(evaluate('=', undefined, null)).toBe(true)
    expect(evaluate('!=', undefined, null)).toBe(false)
  })

  it('orders values', () => {
    expect(evaluate('>', 3, 2)).toBe(true)
    expect(evaluate('<', 3, 2)).toBe(false)
    expect(evaluate('>=', 2, '2')).toBe(true)
    expect(evaluate('<=', 'apple', 'banana')).toBe(true)
  })

  it('evaluates inclusive ranges', () => {
    expect(evaluate('BETWEEN', 10, [10, 20])).toBe(true)
    expect(evaluate('BETWEEN', 21, [10, 20])).toBe(false)
    expect(evaluate('NOT_BETWEEN', 5, [10, 20])).toBe(true)
    expect(evaluate('NOT_BETWEEN', 25, [10, 20])).toBe(true)
    expect(evaluate('NOT_BETWEEN', 15, [10, 20])).toBe(false)
  })

  it('requires a pair of bounds for ranges', () => {
    expect(() => evaluate('BETWEEN', 15, 10)).toThrow(InvalidArgumentError)
    expect(() => evaluate('NOT_BETWEEN', 15, [10])).toThrow('NOT_BETWEEN expects a [lowerBound, upperBound] pair')
  })

  it('tests membership', () => {
    expect(evaluate('IN', 'B', ['a', 'b'])).toBe(true)
    expect(evaluate('IN', 'B', ['a', 'b'], true)).toBe(false)
    expect(evaluate('NOT_IN', 'c', ['a', 'b'])).toBe(true)
    expect(() => evaluate('IN', 'a', 'a')).toThrow('IN expects an array of values')
  })

  it('matches LIKE patterns', () => {
    expect(evaluate('%LIKE', 'Theo', 'o')).toBe(true)
    expect(evaluate('LIKE%', 'Theo', 'th')).toBe(true)
    expect(evaluate('%LIKE%', 'Theo', 'he')).toBe(true)
    expect(evaluate('%NOT_LIKE%', 'Theo', 'x')).toBe(true)
    expect(evaluate('NOT_LIKE%', 'Theo', 't')).toBe(false)
    expect(evaluate('%NOT_LIKE', 'Bob', 'o')).toBe(true)
  })
})

// ============================================================================
// Predicates & Comparator
// ============================================================================

describe('createFilterPredicate', () => {
  it('compares a column of each item', () => {
    const adult = createFilterPredicate<{ age: number }>('age', '>=', 18)
    expect(adult({ age: 20 }, 0)).toBe(true)
    expect(adult({ age: 17 }, 1)).toBe(false)
  })

  it('compares the item itself for an empty column', () => {
    const five = createFilterPredicate<number>(null, '=', 5)
    expect(five(5, 0)).toBe(true)
  })
})

describe('defaultComparator', () => {
  it('compares class instances by identity', () => {
    const tag = new Tag('a')
    expect(defaultComparator(tag, tag)).toBe(0)
    expect(defaultComparator(tag, new Tag('a'))).not.toBe(0)
  })

  it('compares plain structures by value', () => {
    expect(defaultComparator({ a: 1 }, { a: 1 })).toBe(0)
    expect(defaultComparator([1, 2], [1, 2])).toBe(0)
    expect(defaultComparator([1, 2], [2, 1])).not.toBe(0)
  })

  it('compares maps by their entries', () => {
    expect(defaultComparator(new Map([['a', 1]]), new Map([['a', 1]]))).toBe(0)
    expect(defaultComparator(new Map([['a', 1]]), new Map([['b', 1]]))).toBe(-1)
  })

  it('never matches values of different types', () => {
    expect(defaultComparator([1], { 0: 1 })).toBe(-1)
  })

  it('orders scalars naturally', () => {
    expect(defaultComparator(1, 2)).toBe(-1)
    expect(defaultComparator('b', 'a')).toBe(1)
  })
})
