import { describe, test, expect } from 'vitest'
import { BadInput, CohortError } from '@cohort/core'
import { Ast } from '../ast.js'
import { parse, DEFAULT_MAX_DEPTH } from '../grammar.js'
import { compose } from '../printer.js'
import { ErrExpressionSyntax } from '../errors.js'
import { COMPOSED, EXPRESSIONS, INVALID, thrownBy } from './fixtures.js'

describe('parse (grammar)', () => {
  test('single clause', () => {
    expect(parse('sample:3')).toEqual({
      type: 'expression',
      inner: {
        type: 'term',
        inner: { type: 'clause', field: 'sample', value: '3' },
      },
    })
  })

  test('tautology', () => {
    expect(parse('*')).toEqual(Ast.expression(Ast.term(Ast.tautology())))
  })

  test('negation wraps a term', () => {
    expect(parse('not group:2')).toEqual(
      Ast.expression(Ast.term(Ast.negation(Ast.term(Ast.clause('group', '2'))))),
    )
  })

  test('grouping wraps an expression', () => {
    expect(parse('(s:a)')).toEqual(
      Ast.expression(Ast.term(Ast.grouping(Ast.expression(Ast.term(Ast.clause('s', 'a')))))),
    )
  })

  test('connectives lean right: a and b or c', () => {
    const a = Ast.term(Ast.clause('s', 'a'))
    const b = Ast.term(Ast.clause('s', 'b'))
    const c = Ast.term(Ast.clause('s', 'c'))

    expect(parse('s:a and s:b or s:c')).toEqual(
      Ast.expression(Ast.conjunction(a, Ast.expression(Ast.disjunction(b, Ast.expression(c))))),
    )
  })

  test('connectives lean right: a or b and c', () => {
    const a = Ast.term(Ast.clause('s', 'a'))
    const b = Ast.term(Ast.clause('s', 'b'))
    const c = Ast.term(Ast.clause('s', 'c'))

    expect(parse('s:a or s:b and s:c')).toEqual(
      Ast.expression(Ast.disjunction(a, Ast.expression(Ast.conjunction(b, Ast.expression(c))))),
    )
  })

  test('values may contain colons and slashes', () => {
    const expr = parse('sample:https://localhost:8080/samples/3')
    expect(expr.inner).toEqual(Ast.term(Ast.clause('sample', 'https://localhost:8080/samples/3')))
  })

  test('keywords only match as whole words', () => {
    expect(compose(parse('nots:a'))).toBe('nots:a')
    expect(compose(parse('order:1 and andy:2'))).toBe('order:1 and andy:2')
  })

  test('not directly followed by a grouping', () => {
    expect(compose(parse('not(s:a)'))).toBe('not (s:a)')
  })

  test('field symbols may contain dots, dashes and underscores', () => {
    expect(compose(parse('a.b-c_d:1'))).toBe('a.b-c_d:1')
  })

  test.each(EXPRESSIONS)('canonical expression round-trips: %s', (text) => {
    expect(compose(parse(text))).toBe(text)
  })

  test.each(COMPOSED)('formatting variation %j composes to %j', (text, composed) => {
    expect(compose(parse(text))).toBe(composed)
  })
})

describe('parse errors', () => {
  test.each(INVALID)('rejects %j', (text) => {
    const err = thrownBy(() => parse(text))
    expect(ErrExpressionSyntax.is(err)).toBe(true)
    expect(CohortError.has(err, BadInput)).toBe(true)
  })

  test('empty input reports position 0', () => {
    const err = thrownBy(() => parse('   '))
    if (!ErrExpressionSyntax.is(err)) throw new Error('Expected a syntax error')

    expect(err.data.reason).toBe('Empty query expression')
    expect(err.data.index).toBe(0)
    expect(err.data.expression).toBe('   ')
  })

  test('trailing input reports where parsing stopped', () => {
    const err = thrownBy(() => parse('* ()'))
    if (!ErrExpressionSyntax.is(err)) throw new Error('Expected a syntax error')

    expect(err.data.index).toBe(2)
    expect(err.data.reason).toBe('Unexpected input "()"')
    expect(err.message).toBe('Invalid query expression "* ()" — Unexpected input "()" (at position 2)')
  })

  test('trailing input after non-ASCII values is rejected', () => {
    const cjk = thrownBy(() => parse('sample:日本語 extra'))
    if (!ErrExpressionSyntax.is(cjk)) throw new Error('Expected a syntax error')
    expect(cjk.data.index).toBe(11)
    expect(cjk.data.reason).toBe('Unexpected input "extra"')

    const accented = thrownBy(() => parse('sample:éééé )'))
    if (!ErrExpressionSyntax.is(accented)) throw new Error('Expected a syntax error')
    expect(accented.data.index).toBe(12)
    expect(accented.message).toBe('Invalid query expression "sample:éééé )" — Unexpected input ")" (at position 12)')
  })

  test('non-ASCII values parse in full', () => {
    expect(compose(parse('sample:日本語 and (group:éé or sample:ü)'))).toBe('sample:日本語 and (group:éé or sample:ü)')
  })

  test('error positions are string indices', () => {
    const text = 'group:日本 and'
    const err = thrownBy(() => parse(text))
    if (!ErrExpressionSyntax.is(err)) throw new Error('Expected a syntax error')
    expect(err.data.index).toBeLessThanOrEqual(text.length)
  })

  test('keywords cannot be fields', () => {
    for (const text of ['and:1', 'or:1', 'not:1']) {
      expect(ErrExpressionSyntax.is(thrownBy(() => parse(text)))).toBe(true)
    }
  })

  test('* cannot be a field', () => {
    expect(ErrExpressionSyntax.is(thrownBy(() => parse('*:1')))).toBe(true)
  })
})

describe('parse depth limit', () => {
  test('defaults to 256', () => {
    expect(DEFAULT_MAX_DEPTH).toBe(256)
  })

  test('accepts nesting within the limit', () => {
    const text = '('.repeat(50) + 's:a' + ')'.repeat(50)
    expect(compose(parse(text))).toBe(text)
  })

  test('rejects nesting beyond the default limit', () => {
    const text = 'not '.repeat(300) + 's:a'
    const err = thrownBy(() => parse(text))
    if (!ErrExpressionSyntax.is(err)) throw new Error('Expected a syntax error')

    expect(err.data.reason).toBe('Expression nests deeper than 256 levels')
    expect(err.data.index).toBe(256 * 4)
  })

  test('reports the first token beyond a custom limit', () => {
    const err = thrownBy(() => parse('not not not s:a', { maxDepth: 2 }))
    if (!ErrExpressionSyntax.is(err)) throw new Error('Expected a syntax error')

    expect(err.data.reason).toBe('Expression nests deeper than 2 levels')
    expect(err.data.index).toBe(8)
  })

  test('connectives count towards the limit', () => {
    expect(compose(parse('s:a and s:b', { maxDepth: 1 }))).toBe('s:a and s:b')
    expect(ErrExpressionSyntax.is(thrownBy(() => parse('s:a and s:b or s:c', { maxDepth: 1 })))).toBe(true)
  })
})
