/**
 * Structural tests over expressions.
 */

import type { Expression } from './ast.js'
import { accept, Visitor } from './visitor.js'

/** The field whose clauses select a single sample. */
export const SAMPLE_FIELD = 'sample'

/** True only for an expression that is exactly `*`. */
export const TautologyTester: Visitor<boolean> = Visitor.define<boolean>({
  node: () => false,
  expression: (_node, inner) => inner,
  term: (_node, inner) => inner,
  tautology: () => true,
})

/** True only for an expression that is exactly one `sample:` clause. */
export const SingletonTester: Visitor<boolean> = Visitor.define<boolean>({
  node: () => false,
  expression: (_node, inner) => inner,
  term: (_node, inner) => inner,
  clause: (node) => node.field === SAMPLE_FIELD,
})

export type ClausePredicate = (field: string, value: string) => boolean

/**
 * True when every clause satisfies `predicate`. Child results are always
 * AND-combined, also under `or` and `not`; `*` counts as satisfied.
 */
export function clauseTester(predicate: ClausePredicate): Visitor<boolean> {
  return Visitor.define<boolean>({
    tautology: () => true,
    clause: (node) => predicate(node.field, node.value),
    wrapper: (_node, inner) => inner,
    binary: (_node, left, right) => left && right,
  })
}

export function testClauses(expression: Expression, predicate: ClausePredicate): boolean {
  return accept(expression, clauseTester(predicate))
}

export function isTautology(expression: Expression): boolean {
  return accept(expression, TautologyTester)
}

export function isSingleton(expression: Expression): boolean {
  return accept(expression, SingletonTester)
}
