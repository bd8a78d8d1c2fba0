/**
 * CLI error boundary — errors owned by the command line layer.
 */

import { BadInput, ErrFacet, CohortError } from '@cohort/core'

export const CliBoundary = CohortError.boundary('cli')

/** The same field was mapped to more than one column. */
export const ErrDuplicateColumn = CliBoundary.define('duplicate_column', {
  customProps: ErrFacet.props<{ field: string; columns: string[] }>(),
  facets: [BadInput],
  message: (d) => `Field "${d.field}" is mapped to more than one column: ${d.columns.join(', ')}`,
})
