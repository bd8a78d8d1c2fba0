/**
 * Identity visitor: rebuilds the visited tree node by node.
 *
 * Other rewriting visitors extend it and override only the node kinds they
 * change.
 */

import {
  Ast,
  expectExpression,
  expectExpressionBody,
  expectTerm,
  expectTermBody,
  type Expression,
  type Node,
} from './ast.js'
import { accept, Visitor } from './visitor.js'

export const Identity: Visitor<Node> = Visitor.define<Node>({
  tautology: () => Ast.tautology(),
  clause: (node) => Ast.clause(node.field, node.value),
  expression: (_node, inner) => Ast.expression(expectExpressionBody(inner)),
  term: (_node, inner) => Ast.term(expectTermBody(inner)),
  negation: (_node, inner) => Ast.negation(expectTerm(inner)),
  grouping: (_node, inner) => Ast.grouping(expectExpression(inner)),
  conjunction: (_node, left, right) => Ast.conjunction(expectTerm(left), expectExpression(right)),
  disjunction: (_node, left, right) => Ast.disjunction(expectTerm(left), expectExpression(right)),
})

/** Apply a tree-rewriting visitor to an expression. */
export function rewrite(expression: Expression, visitor: Visitor<Node>): Expression {
  return expectExpression(accept(expression, visitor))
}

/** A structurally identical tree sharing no nodes with `expression`. */
export function deepCopy(expression: Expression): Expression {
  return rewrite(expression, Identity)
}

export type ClauseValueUpdate = (field: string, value: string) => string

/** Identity, except that every clause value is replaced by `update(field, value)`. */
export function clauseValueUpdater(update: ClauseValueUpdate): Visitor<Node> {
  return Visitor.extend(Identity, {
    clause: (node) => Ast.clause(node.field, update(node.field, node.value)),
  })
}

/**
 * Copy of `expression` with every clause value rewritten, e.g. to turn
 * sample URIs into ids. The input tree is left untouched.
 */
export function updateClauseValues(expression: Expression, update: ClauseValueUpdate): Expression {
  return rewrite(expression, clauseValueUpdater(update))
}
