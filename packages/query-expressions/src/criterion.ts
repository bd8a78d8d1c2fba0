/**
 * Compile expressions into a caller-chosen predicate representation.
 */

import type { Expression } from './ast.js'
import { accept, Visitor } from './visitor.js'

/** Boolean connectives over predicates of type P. */
export interface BooleanAlgebra<P> {
  /** The predicate that holds for everything. */
  always(): P
  and(left: P, right: P): P
  or(left: P, right: P): P
  not(operand: P): P
}

/** Builds the predicate for a single `field:value` clause. */
export type ClauseBuilder<P> = (field: string, value: string) => P

export function criterionBuilder<P>(buildClause: ClauseBuilder<P>, algebra: BooleanAlgebra<P>): Visitor<P> {
  return Visitor.define<P>({
    tautology: () => algebra.always(),
    clause: (node) => buildClause(node.field, node.value),
    wrapper: (_node, inner) => inner,
    negation: (_node, inner) => algebra.not(inner),
    conjunction: (_node, left, right) => algebra.and(left, right),
    disjunction: (_node, left, right) => algebra.or(left, right),
  })
}

/**
 * Compile `expression` bottom-up. Groupings add no predicate of their own:
 * the tree shape already fixes the combination order.
 */
export function buildQueryCriterion<P>(
  expression: Expression,
  buildClause: ClauseBuilder<P>,
  algebra: BooleanAlgebra<P>,
): P {
  return accept(expression, criterionBuilder(buildClause, algebra))
}
