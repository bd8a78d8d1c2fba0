import { describe, test, expect } from 'vitest'
import {
  accept,
  Ast,
  buildQueryCriterion,
  compose,
  deepCopy,
  expectExpression,
  expectTerm,
  Identity,
  isSingleton,
  isTautology,
  makeConjunction,
  parse,
  print,
  testClauses,
  updateClauseValues,
  Visitor,
  type BooleanAlgebra,
} from '../index.js'
import { CLAUSE_INDICES, EXPRESSIONS, SHORT_VALUE_INDICES, UPDATED } from './fixtures.js'

const addOne = (_field: string, value: string) => String(Number(value) + 1)

const Switcher = Visitor.extend(Identity, {
  conjunction: (_node, left, right) => Ast.disjunction(expectTerm(left), expectExpression(right)),
  disjunction: (_node, left, right) => Ast.conjunction(expectTerm(left), expectExpression(right)),
})

/** True only for an expression that is exactly one clause. */
const ClauseTester = Visitor.define<boolean>({
  node: () => false,
  term: (_node, inner) => inner,
  expression: (_node, inner) => inner,
  clause: () => true,
})

/** Predicates as strings, to make the compiled shape visible. */
const textAlgebra: BooleanAlgebra<string> = {
  always: () => 'TRUE',
  and: (l, r) => `AND(${l}, ${r})`,
  or: (l, r) => `OR(${l}, ${r})`,
  not: (p) => `NOT(${p})`,
}

describe('deepCopy', () => {
  test.each(EXPRESSIONS)('copy of %s composes identically', (text) => {
    const expression = parse(text)
    expect(compose(deepCopy(expression))).toBe(compose(expression))
  })

  test('copy is structurally equal but distinct', () => {
    const expression = parse('sample:a and (group:b or group:c) and not group:d')
    const copy = deepCopy(expression)
    expect(copy).toEqual(expression)
    expect(copy).not.toBe(expression)
  })
})

describe('print', () => {
  test.each(EXPRESSIONS)('printer agrees with compose for %s', (text) => {
    const expression = parse(text)
    expect(print(expression)).toBe(compose(expression))
  })

  test('prints a single node', () => {
    expect(print(Ast.negation(Ast.term(Ast.clause('group', '5'))))).toBe('not group:5')
  })

  test('is stable under reparse', () => {
    const once = compose(parse('  not ( s : a   or  * )and t:b '))
    expect(once).toBe('not (s:a or *) and t:b')
    expect(compose(parse(once))).toBe(once)
  })
})

describe('Identity extension', () => {
  test.each(EXPRESSIONS)('switching connectives in %s', (text) => {
    const switched = expectExpression(accept(parse(text), Switcher))
    const expected = text
      .replaceAll('and', '%OLDAND%')
      .replaceAll('or', 'and')
      .replaceAll('%OLDAND%', 'or')
    expect(compose(switched)).toBe(expected)
  })
})

describe('custom visitor', () => {
  test.each(EXPRESSIONS.map((text, i): [string, boolean] => [text, CLAUSE_INDICES.includes(i)]))(
    'is %s a single clause: %s',
    (text, expected) => {
      expect(accept(parse(text), ClauseTester)).toBe(expected)
    },
  )
})

describe('buildQueryCriterion', () => {
  const build = (field: string, value: string) => `${field}=${value}`

  test('clause', () => {
    expect(buildQueryCriterion(parse('sample:3'), build, textAlgebra)).toBe('sample=3')
  })

  test('tautology uses always()', () => {
    expect(buildQueryCriterion(parse('(*)'), build, textAlgebra)).toBe('TRUE')
  })

  test('groupings add nothing and connectives lean right', () => {
    expect(buildQueryCriterion(parse('sample:1 and (group:2 or sample:3) and not group:4'), build, textAlgebra))
      .toBe('AND(sample=1, AND(OR(group=2, sample=3), NOT(group=4)))')
    expect(buildQueryCriterion(parse('sample:1 and sample:2 or sample:3 and sample:4'), build, textAlgebra))
      .toBe('AND(sample=1, OR(sample=2, AND(sample=3, sample=4)))')
  })

  test('clause builder errors propagate unchanged', () => {
    const boom = new Error('can only query on sample or group')
    const failing = (field: string): string => {
      if (field === 'sample') return 'ok'
      throw boom
    }
    expect(() => buildQueryCriterion(parse('sample:1 or tissue:liver'), failing, textAlgebra)).toThrow(boom)
  })
})

describe('updateClauseValues', () => {
  test.each(UPDATED)('%s becomes %s', (text, expected) => {
    expect(compose(updateClauseValues(parse(text), addOne))).toBe(expected)
  })

  test('the input is left untouched', () => {
    const expression = parse('sample:1 and not group:2')
    updateClauseValues(expression, addOne)
    expect(compose(expression)).toBe('sample:1 and not group:2')
  })

  test('update receives field and value', () => {
    const seen: string[] = []
    updateClauseValues(parse('sample:1 or group:2'), (field, value) => {
      seen.push(`${field}/${value}`)
      return value
    })
    expect(seen).toEqual(['sample/1', 'group/2'])
  })

  test('update errors propagate unchanged', () => {
    expect(() => updateClauseValues(parse('sample:x'), () => { throw new Error('unknown sample') }))
      .toThrow('unknown sample')
  })
})

describe('testClauses', () => {
  const shortValue = (_field: string, value: string) => value.length === 1

  test.each(EXPRESSIONS.map((text, i): [string, boolean] => [text, SHORT_VALUE_INDICES.includes(i)]))(
    'only short values in %s: %s',
    (text, expected) => {
      expect(testClauses(parse(text), shortValue)).toBe(expected)
    },
  )

  test('results are AND-combined under or and not', () => {
    const isSample = (field: string) => field === 'sample'
    expect(testClauses(parse('sample:1 or group:2'), isSample)).toBe(false)
    expect(testClauses(parse('not group:2'), isSample)).toBe(false)
    expect(testClauses(parse('* or not sample:1'), isSample)).toBe(true)
  })
})

describe('isTautology / isSingleton', () => {
  test('isTautology', () => {
    expect(isTautology(parse('*'))).toBe(true)
    expect(isTautology(parse(' * '))).toBe(true)
    expect(isTautology(parse('(*)'))).toBe(false)
    expect(isTautology(parse('not *'))).toBe(false)
    expect(isTautology(parse('* or sample:1'))).toBe(false)
  })

  test('isSingleton', () => {
    expect(isSingleton(parse('sample:3'))).toBe(true)
    expect(isSingleton(parse('group:3'))).toBe(false)
    expect(isSingleton(parse('(sample:3)'))).toBe(false)
    expect(isSingleton(parse('not sample:3'))).toBe(false)
    expect(isSingleton(parse('sample:3 or sample:4'))).toBe(false)
  })
})

describe('makeConjunction', () => {
  const pairs = EXPRESSIONS.slice(0, -1).map((left, i): [string, string] => [left, EXPRESSIONS[i + 1] ?? ''])

  test.each(pairs)('(%s) and …', (left, right) => {
    const expression = makeConjunction(parse(left), parse(right))
    expect(compose(expression)).toBe(`(${left}) and ${right}`)
  })

  test('keeps the meaning of the left connectives', () => {
    const expression = makeConjunction(parse('s:a or s:b'), parse('s:c'))
    expect(expression.inner.type).toBe('conjunction')
    expect(compose(parse(compose(expression)))).toBe('(s:a or s:b) and s:c')
  })
})
