/**
 * AST for sample/group query expressions.
 *
 * Nodes are plain readonly records discriminated by `type`. The shape mirrors
 * the grammar exactly, so `a and b or c` is
 *   expression(conjunction(term(a), expression(disjunction(term(b), expression(term(c))))))
 */

import { StaticTypeCompanion } from '@cohort/core'
import { ErrInvalidField, ErrMalformedTree } from './errors.js'

// ============================================================================
// Node types
// ============================================================================

/** `*` — matches everything. */
export interface Tautology {
  readonly type: 'tautology'
}

/** `field:value` */
export interface Clause {
  readonly type: 'clause'
  readonly field: string
  readonly value: string
}

/** `( expression )` */
export interface Grouping {
  readonly type: 'grouping'
  readonly inner: Expression
}

/** `not term` */
export interface Negation {
  readonly type: 'negation'
  readonly inner: Term
}

export type TermBody = Grouping | Negation | Clause | Tautology

export interface Term {
  readonly type: 'term'
  readonly inner: TermBody
}

/** `term and expression` */
export interface Conjunction {
  readonly type: 'conjunction'
  readonly left: Term
  readonly right: Expression
}

/** `term or expression` */
export interface Disjunction {
  readonly type: 'disjunction'
  readonly left: Term
  readonly right: Expression
}

export type ExpressionBody = Conjunction | Disjunction | Term

export interface Expression {
  readonly type: 'expression'
  readonly inner: ExpressionBody
}

// ============================================================================
// Categories
// ============================================================================

export type LeafNode = Tautology | Clause
export type WrapperNode = Expression | Term | Negation | Grouping
export type BinaryNode = Conjunction | Disjunction
export type Node = LeafNode | WrapperNode | BinaryNode

export type NodeType = Node['type']
export type NodeCategory = 'leaf' | 'wrapper' | 'binary' | 'node'

/** Anything a visitor handler can be registered for. */
export type NodeKind = NodeType | NodeCategory

// ============================================================================
// Symbols
// ============================================================================

export const KEYWORDS = ['and', 'or', 'not'] as const

const SYMBOL = /^[A-Za-z][A-Za-z0-9._-]*$/

/** True when `text` can be used as a clause field. */
export function isSymbol(text: string): boolean {
  return SYMBOL.test(text) && !KEYWORDS.some((k) => k === text)
}

// ============================================================================
// Narrowing
// ============================================================================

function malformed(expected: string, node: Node): never {
  throw ErrMalformedTree.create({ expected, actual: node.type })
}

export function expectExpression(node: Node): Expression {
  return node.type === 'expression' ? node : malformed('expression', node)
}

export function expectTerm(node: Node): Term {
  return node.type === 'term' ? node : malformed('term', node)
}

export function expectTermBody(node: Node): TermBody {
  switch (node.type) {
    case 'grouping':
    case 'negation':
    case 'clause':
    case 'tautology':
      return node
    default:
      return malformed('grouping, negation, clause or tautology', node)
  }
}

export function expectExpressionBody(node: Node): ExpressionBody {
  switch (node.type) {
    case 'conjunction':
    case 'disjunction':
    case 'term':
      return node
    default:
      return malformed('conjunction, disjunction or term', node)
  }
}

// ============================================================================
// Constructors
// ============================================================================

export const Ast = StaticTypeCompanion({
  tautology(): Tautology {
    return { type: 'tautology' }
  },

  /** @throws ErrInvalidField when `field` is not a symbol */
  clause(field: string, value: string): Clause {
    if (!isSymbol(field)) throw ErrInvalidField.create({ field })
    return { type: 'clause', field, value }
  },

  grouping(inner: Expression): Grouping {
    return { type: 'grouping', inner }
  },

  negation(inner: Term): Negation {
    return { type: 'negation', inner }
  },

  term(inner: TermBody): Term {
    return { type: 'term', inner }
  },

  conjunction(left: Term, right: Expression): Conjunction {
    return { type: 'conjunction', left, right }
  },

  disjunction(left: Term, right: Expression): Disjunction {
    return { type: 'disjunction', left, right }
  },

  expression(inner: ExpressionBody): Expression {
    return { type: 'expression', inner }
  },
})

/**
 * `(left) and right` — the left expression is wrapped in a grouping so its
 * own connectives keep their meaning.
 */
export function makeConjunction(left: Expression, right: Expression): Expression {
  return Ast.expression(Ast.conjunction(Ast.term(Ast.grouping(left)), right))
}
