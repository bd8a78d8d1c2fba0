/**
 * Visitor dispatch.
 *
 * A Visitor is a table from node kinds to handlers, optionally layered over a
 * single base visitor. Handlers may be registered for a concrete node type or
 * for one of its categories; lookup goes from the concrete type through its
 * categories, most specific first, and only then falls through to the base.
 *
 * Traversal is separate from dispatch: `accept` walks the tree post-order and
 * hands every handler the already-computed results of the node's children.
 */

import type {
  BinaryNode,
  Clause,
  Conjunction,
  Disjunction,
  Expression,
  Grouping,
  LeafNode,
  Negation,
  Node,
  NodeKind,
  NodeType,
  Tautology,
  Term,
  WrapperNode,
} from './ast.js'
import { ErrNoVisitHandler } from './errors.js'

export interface Handlers<R> {
  tautology: (node: Tautology) => R
  clause: (node: Clause) => R
  expression: (node: Expression, inner: R) => R
  term: (node: Term, inner: R) => R
  negation: (node: Negation, inner: R) => R
  grouping: (node: Grouping, inner: R) => R
  conjunction: (node: Conjunction, left: R, right: R) => R
  disjunction: (node: Disjunction, left: R, right: R) => R
  leaf: (node: LeafNode) => R
  wrapper: (node: WrapperNode, inner: R) => R
  binary: (node: BinaryNode, left: R, right: R) => R
  node: (node: Node, ...children: R[]) => R
}

export type HandlerFor<R, K extends NodeKind> = NonNullable<Partial<Handlers<R>>[K]>

/** Lookup order for each concrete node type. */
const LINEAGE = {
  tautology: ['tautology', 'leaf', 'node'],
  clause: ['clause', 'leaf', 'node'],
  expression: ['expression', 'wrapper', 'node'],
  term: ['term', 'wrapper', 'node'],
  negation: ['negation', 'wrapper', 'node'],
  grouping: ['grouping', 'wrapper', 'node'],
  conjunction: ['conjunction', 'binary', 'node'],
  disjunction: ['disjunction', 'binary', 'node'],
} as const satisfies Record<NodeType, readonly NodeKind[]>

export class Visitor<R> {
  private constructor(
    private readonly handlers: Partial<Handlers<R>>,
    readonly base: Visitor<R> | undefined,
  ) {}

  /** A visitor with no base. */
  static define<R>(handlers: Partial<Handlers<R>>): Visitor<R> {
    return new Visitor<R>({ ...handlers }, undefined)
  }

  /** A visitor whose missing handlers are looked up in `base`. */
  static extend<R>(base: Visitor<R>, handlers: Partial<Handlers<R>>): Visitor<R> {
    return new Visitor<R>({ ...handlers }, base)
  }

  /** True when this table itself (ignoring the base) handles `kind`. */
  handles(kind: NodeKind): boolean {
    return this.handlers[kind] !== undefined
  }

  /**
   * Find the handler for a node of `nodeType`, trying each kind of `lineage`
   * in order, then the base visitor.
   *
   * @throws ErrNoVisitHandler when no table in the chain handles any of them
   */
  resolve<K extends NodeKind>(nodeType: NodeType, lineage: readonly K[]): HandlerFor<R, K> {
    for (const kind of lineage) {
      const handler = this.handlers[kind]
      if (handler !== undefined) return handler
    }
    if (this.base) return this.base.resolve(nodeType, lineage)
    throw ErrNoVisitHandler.create({ nodeType })
  }
}

/**
 * Visit `node` and its descendants post-order, returning the result the
 * visitor computes for `node`.
 */
export function accept<R>(node: Node, visitor: Visitor<R>): R {
  switch (node.type) {
    case 'tautology':
      return visitor.resolve(node.type, LINEAGE.tautology)(node)
    case 'clause':
      return visitor.resolve(node.type, LINEAGE.clause)(node)
    case 'expression':
      return visitor.resolve(node.type, LINEAGE.expression)(node, accept(node.inner, visitor))
    case 'term':
      return visitor.resolve(node.type, LINEAGE.term)(node, accept(node.inner, visitor))
    case 'negation':
      return visitor.resolve(node.type, LINEAGE.negation)(node, accept(node.inner, visitor))
    case 'grouping':
      return visitor.resolve(node.type, LINEAGE.grouping)(node, accept(node.inner, visitor))
    case 'conjunction': {
      const left = accept(node.left, visitor)
      const right = accept(node.right, visitor)
      return visitor.resolve(node.type, LINEAGE.conjunction)(node, left, right)
    }
    case 'disjunction': {
      const left = accept(node.left, visitor)
      const right = accept(node.right, visitor)
      return visitor.resolve(node.type, LINEAGE.disjunction)(node, left, right)
    }
  }
}
