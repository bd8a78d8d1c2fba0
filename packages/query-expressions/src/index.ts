/**
 * @cohort/query-expressions — Parse, rewrite, print and compile sample/group
 * query expressions.
 *
 * @example
 * ```ts
 * import { parse, compose, lowerToWhereClause } from '@cohort/query-expressions'
 *
 * const expr = parse('sample:3 and (group:2 or sample:4) and not group:5')
 * compose(expr)             // canonical text
 * lowerToWhereClause(expr)  // WhereClause tree
 * ```
 */

export type {
  BinaryNode,
  Clause,
  Conjunction,
  Disjunction,
  Expression,
  ExpressionBody,
  Grouping,
  LeafNode,
  Negation,
  Node,
  NodeCategory,
  NodeKind,
  NodeType,
  Tautology,
  Term,
  TermBody,
  WrapperNode,
} from './ast.js'
export {
  Ast,
  KEYWORDS,
  isSymbol,
  makeConjunction,
  expectExpression,
  expectExpressionBody,
  expectTerm,
  expectTermBody,
} from './ast.js'

export { Visitor, accept } from './visitor.js'
export type { Handlers, HandlerFor } from './visitor.js'

export { parse, DEFAULT_MAX_DEPTH } from './grammar.js'
export type { ParseOptions } from './grammar.js'

export { Identity, deepCopy, rewrite, clauseValueUpdater, updateClauseValues } from './identity.js'
export type { ClauseValueUpdate } from './identity.js'
export { Printer, compose, print } from './printer.js'
export { criterionBuilder, buildQueryCriterion } from './criterion.js'
export type { BooleanAlgebra, ClauseBuilder } from './criterion.js'
export {
  SAMPLE_FIELD,
  TautologyTester,
  SingletonTester,
  clauseTester,
  testClauses,
  isTautology,
  isSingleton,
} from './testers.js'
export type { ClausePredicate } from './testers.js'

export { coerceValue } from './coerce.js'
export { whereClauseAlgebra, equalityFilter, lowerToWhereClause } from './lower.js'
export { SqlCriterion, sqlCriterionAlgebra } from './sql-criterion.js'
export type { SqlComparisonOp, SqlFilterResult } from './sql-criterion.js'
export { SampleQuery, SAMPLE_QUERY_FIELDS } from './sample-query.js'
export type { SampleQueryOptions } from './sample-query.js'

export {
  ErrExpressionSyntax,
  ErrNoVisitHandler,
  ErrMalformedTree,
  ErrInvalidField,
  ErrUnknownField,
} from './errors.js'
