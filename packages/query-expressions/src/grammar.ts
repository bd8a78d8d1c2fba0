/**
 * Arcsecond grammar for query expressions.
 *
 * Grammar:
 *   expression := term (('and' | 'or') expression)?
 *   term       := '(' expression ')' | 'not' term | clause | '*'
 *   clause     := symbol ':' value
 *   symbol     := [A-Za-z][A-Za-z0-9._-]*   (not a keyword)
 *   value      := [^()\s]+
 *
 * The connective after a term applies to everything to its right, so
 * `a and b or c` reads as `a and (b or c)`. Whitespace between tokens is
 * insignificant.
 */

import {
  char,
  choice,
  coroutine,
  optionalWhitespace,
  possibly,
  recursiveParser,
  regex,
  type Parser,
} from 'arcsecond'

import { Ast, type Clause, type Expression, type Grouping, type Negation, type Tautology, type Term } from './ast.js'
import { ErrExpressionSyntax } from './errors.js'

// ============================================================================
// Tokens
// ============================================================================

/** Skip leading whitespace, then run `parser`. */
function token<T>(parser: Parser<T>): Parser<T> {
  return coroutine<T>(run => {
    run(optionalWhitespace)
    return run(parser)
  })
}

/** A keyword matches only as a whole word. */
function keyword(word: string): Parser<string> {
  return token(regex(new RegExp(`^${word}(?![A-Za-z0-9._-])`)))
}

const symbol: Parser<string> = token(regex(/^(?!(?:and|or|not)(?![A-Za-z0-9._-]))[A-Za-z][A-Za-z0-9._-]*/))
const value: Parser<string> = token(regex(/^[^()\s]+/))
const connective: Parser<string> = choice([keyword('and'), keyword('or')])
const not: Parser<string> = keyword('not')
const colon: Parser<string> = token(char(':'))
const star: Parser<string> = token(char('*'))
const openParen: Parser<string> = token(char('('))
const closeParen: Parser<string> = token(char(')'))

// ============================================================================
// Grammar
// ============================================================================

const clause = coroutine<Clause>(run => {
  const field: string = run(symbol)
  run(colon)
  const raw: string = run(value)
  return Ast.clause(field, raw)
})

const tautology: Parser<Tautology> = star.map(() => Ast.tautology())

const grouping = coroutine<Grouping>(run => {
  run(openParen)
  const inner: Expression = run(expression)
  run(closeParen)
  return Ast.grouping(inner)
})

const negation = coroutine<Negation>(run => {
  run(not)
  const inner: Term = run(term)
  return Ast.negation(inner)
})

/** Ordered choice: grouping, negation, clause, tautology. */
const term: Parser<Term> = recursiveParser(() =>
  choice([grouping, negation, clause, tautology]).map(Ast.term)
)

const expression: Parser<Expression> = recursiveParser(() =>
  coroutine<Expression>(run => {
    const left: Term = run(term)
    const op: string | null = run(possibly(connective))
    if (op === null) return Ast.expression(left)
    const right: Expression = run(expression)
    return Ast.expression(op === 'and' ? Ast.conjunction(left, right) : Ast.disjunction(left, right))
  })
)

const document = coroutine<Expression>(run => {
  const result: Expression = run(expression)
  run(optionalWhitespace)
  return result
})

// ============================================================================
// Public API
// ============================================================================

export const DEFAULT_MAX_DEPTH = 256

export interface ParseOptions {
  /**
   * Upper bound on the number of `(`, `not`, `and` and `or` tokens.
   * Each of them opens at most one level of parser recursion.
   */
  readonly maxDepth?: number
}

const NESTING_TOKEN = /\(|(?<![A-Za-z0-9._-])(?:and|or|not)(?![A-Za-z0-9._-])/g

/** Position of the first nesting token beyond `maxDepth`, if any. */
function depthOverflow(input: string, maxDepth: number): number | undefined {
  let count = 0
  for (const match of input.matchAll(NESTING_TOKEN)) {
    count += 1
    if (count > maxDepth) return match.index ?? 0
  }
  return undefined
}

const utf8 = new TextEncoder()
const utf16 = new TextDecoder()

/** arcsecond reports offsets in UTF-8 bytes; map one back to a string index. */
function charIndex(bytes: Uint8Array, byteIndex: number): number {
  return utf16.decode(bytes.subarray(0, byteIndex)).length
}

/**
 * Parse a query expression.
 *
 * @example
 * parse('sample:3 and (group:2 or sample:4) and not group:5')
 *
 * @throws ErrExpressionSyntax when the whole input is not a valid expression
 */
export function parse(input: string, options: ParseOptions = {}): Expression {
  if (!input.trim()) {
    throw ErrExpressionSyntax.create({
      expression: input,
      reason: 'Empty query expression',
      index: 0,
    })
  }

  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH
  const overflow = depthOverflow(input, maxDepth)
  if (overflow !== undefined) {
    throw ErrExpressionSyntax.create({
      expression: input,
      reason: `Expression nests deeper than ${maxDepth} levels`,
      index: overflow,
    })
  }

  const bytes = utf8.encode(input)
  const result = document.run(input)

  if (result.isError) {
    throw ErrExpressionSyntax.create({
      expression: input,
      reason: String(result.error),
      index: charIndex(bytes, result.index),
    })
  }

  if (result.index < bytes.length) {
    const index = charIndex(bytes, result.index)
    throw ErrExpressionSyntax.create({
      expression: input,
      reason: `Unexpected input "${input.slice(index)}"`,
      index,
    })
  }

  return result.result
}
