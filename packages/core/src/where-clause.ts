/**
 * WhereClause - serializable filter tree handed to a query engine.
 *
 * Leaves are field comparisons; inner nodes group clauses with AND / OR or
 * negate a single clause. The tree is pure data: producers (e.g. the query
 * expression compiler) build it, engines interpret it.
 *
 * @example
 * const where = WhereClause.and(
 *   { field: "sample", op: "=", value: 3 },
 *   WhereClause.not({ field: "group", op: "=", value: 5 }),
 * )
 */

import {StaticTypeCompanion} from "./companion.js";

export type QueryFilter = {
  readonly field: string;
  readonly op: "=" | "!=" | ">" | "<" | ">=" | "<=" | "contains";
  readonly value: unknown;
};

/** Recursive filter tree - AND/OR grouping and NOT over leaf comparisons. */
export type WhereClause =
  | QueryFilter
  | { readonly kind: 'and'; readonly clauses: WhereClause[] }
  | { readonly kind: 'or';  readonly clauses: WhereClause[] }
  | { readonly kind: 'not'; readonly clause: WhereClause }

const EMPTY: WhereClause = { kind: 'and', clauses: [] }

/** Type + companion for WhereClause. */
export const WhereClause = StaticTypeCompanion({
  /** Create an AND group. */
  and(...clauses: WhereClause[]): WhereClause {
    return { kind: 'and', clauses }
  },
  /** Create an OR group. */
  or(...clauses: WhereClause[]): WhereClause {
    return { kind: 'or', clauses }
  },
  /** Negate a clause. */
  not(clause: WhereClause): WhereClause {
    return { kind: 'not', clause }
  },
  /** Type guard: is this a leaf QueryFilter (not an and/or/not node)? */
  isLeaf(w: WhereClause): w is QueryFilter {
    return !('kind' in w)
  },
  /** True for an AND group without clauses, which matches everything. */
  isEmpty(w: WhereClause): boolean {
    return 'kind' in w && w.kind === 'and' && w.clauses.length === 0
  },
  /** Empty where clause (matches everything). */
  empty: EMPTY,
})
