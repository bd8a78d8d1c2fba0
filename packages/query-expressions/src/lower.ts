/**
 * Lower an expression into a WhereClause tree for a query engine.
 *
 * Clauses become QueryFilter leaves, connectives become WhereClause groups
 * and negations `not` nodes. `*` lowers to the empty clause.
 */

import { WhereClause } from '@cohort/core'
import type { QueryFilter } from '@cohort/core'
import type { Expression } from './ast.js'
import { coerceValue } from './coerce.js'
import { buildQueryCriterion, type BooleanAlgebra, type ClauseBuilder } from './criterion.js'

export const whereClauseAlgebra: BooleanAlgebra<WhereClause> = {
  always: () => WhereClause.empty,
  and: (left, right) => WhereClause.and(left, right),
  or: (left, right) => WhereClause.or(left, right),
  not: (operand) => WhereClause.not(operand),
}

/** `field:value` → `field = <coerced value>` */
export function equalityFilter(field: string, value: string): QueryFilter {
  return { field, op: '=', value: coerceValue(value) } satisfies QueryFilter
}

export function lowerToWhereClause(
  expression: Expression,
  buildClause: ClauseBuilder<WhereClause> = equalityFilter,
): WhereClause {
  return buildQueryCriterion(expression, buildClause, whereClauseAlgebra)
}
