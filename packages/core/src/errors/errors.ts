/**
 * Facets shared by every boundary.
 */

import {ErrFacet} from "../cohort-error.js";

/** Caller provided invalid input */
export const BadInput = ErrFacet.marker("BadInput");

/** Internal invariant violated — always a bug */
export const InvariantViolated = ErrFacet.marker("InvariantViolated");

/** The query expression text the error relates to */
export const HasExpression = ErrFacet.data<{ expression: string }>("HasExpression");

/** A character offset into that expression */
export const HasPosition = ErrFacet.data<{ index: number }>("HasPosition");
