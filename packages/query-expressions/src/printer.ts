/**
 * Canonical text rendering.
 *
 * Exactly one space around connectives and after `not`, none inside
 * parentheses or around `:`. Parsing the output yields an equal tree.
 */

import type { Expression, Node } from './ast.js'
import { accept, Visitor } from './visitor.js'

export const Printer: Visitor<string> = Visitor.define<string>({
  tautology: () => '*',
  clause: (node) => `${node.field}:${node.value}`,
  wrapper: (_node, inner) => inner,
  negation: (_node, inner) => `not ${inner}`,
  grouping: (_node, inner) => `(${inner})`,
  conjunction: (_node, left, right) => `${left} and ${right}`,
  disjunction: (_node, left, right) => `${left} or ${right}`,
})

/** Canonical text of any node. */
export function print(node: Node): string {
  return accept(node, Printer)
}

/** Canonical text of an expression. */
export function compose(expression: Expression): string {
  return print(expression)
}
