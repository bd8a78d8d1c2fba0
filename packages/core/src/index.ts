/**
 * @cohort/core - Shared types and the error system for cohort-query
 */

// Error system (CohortError and ErrFacet are both type and value)
export { CohortError, ErrFacet } from "./cohort-error.js";
export type { ErrMarkerFacet, ErrDataFacet, ErrFacetAny, ErrProps, InferPropsData, FacetProps, MergeFacetProps, ErrorDef, ErrorBoundary } from "./cohort-error.js";

// Standard facets
export * from "./errors/errors.js";

// Filter tree (WhereClause is both type and value)
export { WhereClause } from "./where-clause.js";
export type { QueryFilter } from "./where-clause.js";

// Formatting
export { Fmt } from "./fmt.js";

// Utilities
export { StaticTypeCompanion } from "./companion.js";
