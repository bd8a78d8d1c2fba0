/**
 * Error boundary for query expressions.
 */

import { BadInput, ErrFacet, HasExpression, HasPosition, InvariantViolated, CohortError } from '@cohort/core'

const QueryExpressionsBoundary = CohortError.boundary('query-expressions')

/** The expression text does not match the grammar in its entirety. */
export const ErrExpressionSyntax = QueryExpressionsBoundary.define('syntax_error', {
  customProps: ErrFacet.props<{ reason: string }>(),
  facets: [BadInput, HasExpression, HasPosition],
  message: (d) => `Invalid query expression "${d.expression}" — ${d.reason} (at position ${d.index})`,
})

/** A visitor has no handler for a node kind, directly or through its base. */
export const ErrNoVisitHandler = QueryExpressionsBoundary.define('no_visit_handler', {
  customProps: ErrFacet.props<{ nodeType: string }>(),
  facets: [InvariantViolated],
  message: (d) => `No visitor handler registered for node type "${d.nodeType}"`,
})

/** A visitor produced a node of the wrong kind for its parent slot. */
export const ErrMalformedTree = QueryExpressionsBoundary.define('malformed_tree', {
  customProps: ErrFacet.props<{ expected: string; actual: string }>(),
  facets: [InvariantViolated],
  message: (d) => `Expected ${d.expected} node, got "${d.actual}"`,
})

/** A clause field is not a valid symbol. */
export const ErrInvalidField = QueryExpressionsBoundary.define('invalid_field', {
  customProps: ErrFacet.props<{ field: string }>(),
  facets: [BadInput],
  message: (d) => `Invalid clause field "${d.field}"`,
})

/** A clause uses a field the query does not allow. */
export const ErrUnknownField = QueryExpressionsBoundary.define('unknown_field', {
  customProps: ErrFacet.props<{ field: string; allowed: string[] }>(),
  facets: [BadInput, HasExpression],
  message: (d) => `Unknown field "${d.field}" in "${d.expression}" — expected one of: ${d.allowed.join(', ')}`,
})
