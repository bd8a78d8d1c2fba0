/**
 * Parameterised SQL predicates.
 *
 * A SqlCriterion is either a constant or a fragment with `?` placeholders and
 * its positional params. Combining folds constants away, so `*` never reaches
 * the generated SQL unless the whole expression is constant.
 *
 * @example
 * const criterion = buildQueryCriterion(parse('sample:1 or not group:2'), build, sqlCriterionAlgebra)
 * SqlCriterion.toSql(criterion) // { sql: 'sample.id = ? OR NOT (...)', params: [1, 2] }
 */

import { StaticTypeCompanion } from '@cohort/core'
import type { BooleanAlgebra } from './criterion.js'

/** Binding strength of the fragment's outermost operator. */
type Precedence = 'or' | 'and' | 'not' | 'atom'

export type SqlCriterion =
  | { readonly kind: 'constant'; readonly value: boolean }
  | {
      readonly kind: 'fragment'
      readonly sql: string
      readonly params: readonly unknown[]
      readonly precedence: Precedence
    }

type Fragment = Extract<SqlCriterion, { kind: 'fragment' }>

export interface SqlFilterResult {
  sql: string
  params: unknown[]
}

export type SqlComparisonOp = '=' | '!=' | '<' | '>' | '<=' | '>='

const TRUE: SqlCriterion = { kind: 'constant', value: true }
const FALSE: SqlCriterion = { kind: 'constant', value: false }

function fragment(sql: string, params: readonly unknown[], precedence: Precedence): Fragment {
  return { kind: 'fragment', sql, params, precedence }
}

/** Render an AND operand; OR binds looser, so it needs parentheses. */
function andOperand(c: Fragment): string {
  return c.precedence === 'or' ? `(${c.sql})` : c.sql
}

function and(left: SqlCriterion, right: SqlCriterion): SqlCriterion {
  if (left.kind === 'constant') return left.value ? right : FALSE
  if (right.kind === 'constant') return right.value ? left : FALSE
  return fragment(
    `${andOperand(left)} AND ${andOperand(right)}`,
    [...left.params, ...right.params],
    'and',
  )
}

function or(left: SqlCriterion, right: SqlCriterion): SqlCriterion {
  if (left.kind === 'constant') return left.value ? TRUE : right
  if (right.kind === 'constant') return right.value ? TRUE : left
  return fragment(`${left.sql} OR ${right.sql}`, [...left.params, ...right.params], 'or')
}

function not(operand: SqlCriterion): SqlCriterion {
  if (operand.kind === 'constant') return operand.value ? FALSE : TRUE
  return fragment(`NOT (${operand.sql})`, operand.params, 'not')
}

export const SqlCriterion = StaticTypeCompanion({
  TRUE,
  FALSE,

  /** `column op ?` with `value` as its parameter. */
  compare(column: string, op: SqlComparisonOp, value: unknown): SqlCriterion {
    return fragment(`${column} ${op} ?`, [value], 'atom')
  },

  /** A self-contained fragment, such as an EXISTS subquery. */
  raw(sql: string, params: readonly unknown[] = []): SqlCriterion {
    return fragment(sql, params, 'atom')
  },

  and,
  or,
  not,

  toSql(criterion: SqlCriterion): SqlFilterResult {
    if (criterion.kind === 'constant') {
      return { sql: criterion.value ? 'true' : 'false', params: [] }
    }
    return { sql: criterion.sql, params: [...criterion.params] }
  },
})

export const sqlCriterionAlgebra: BooleanAlgebra<SqlCriterion> = {
  always: () => TRUE,
  and,
  or,
  not,
}
