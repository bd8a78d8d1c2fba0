/**
 * SampleQuery — a parsed expression over the `sample` and `group` fields.
 *
 * Wraps an expression with the checks and rewrites an annotation request
 * needs: field validation, shape tests, value resolution and sample
 * exclusion.
 */

import { makeConjunction, type Expression } from './ast.js'
import { buildQueryCriterion, type BooleanAlgebra, type ClauseBuilder } from './criterion.js'
import { ErrUnknownField } from './errors.js'
import { parse, type ParseOptions } from './grammar.js'
import { updateClauseValues, type ClauseValueUpdate } from './identity.js'
import { compose } from './printer.js'
import { isSingleton, isTautology, testClauses } from './testers.js'

export const SAMPLE_QUERY_FIELDS: readonly string[] = ['sample', 'group']

export interface SampleQueryOptions extends ParseOptions {
  /** Fields clauses may use. Defaults to `sample` and `group`. */
  readonly fields?: readonly string[]
}

export class SampleQuery {
  private constructor(readonly expression: Expression) {}

  /**
   * @throws ErrExpressionSyntax when `text` does not parse
   * @throws ErrUnknownField when a clause uses a field outside `options.fields`
   */
  static parse(text: string, options: SampleQueryOptions = {}): SampleQuery {
    const expression = parse(text, options)
    const allowed = options.fields ?? SAMPLE_QUERY_FIELDS

    let offending: string | undefined
    const valid = testClauses(expression, (field) => {
      if (allowed.includes(field)) return true
      offending ??= field
      return false
    })
    if (!valid) {
      throw ErrUnknownField.create({
        expression: text,
        field: offending ?? '',
        allowed: [...allowed],
      })
    }
    return new SampleQuery(expression)
  }

  /** Wrap an already validated expression. */
  static from(expression: Expression): SampleQuery {
    return new SampleQuery(expression)
  }

  /** Canonical text. */
  get text(): string {
    return compose(this.expression)
  }

  /** The query is `*`. */
  get tautology(): boolean {
    return isTautology(this.expression)
  }

  /** The query names exactly one sample. */
  get singleton(): boolean {
    return isSingleton(this.expression)
  }

  /** Every clause is a `group` clause. */
  get onlyGroupClauses(): boolean {
    return testClauses(this.expression, (field) => field === 'group')
  }

  /** Rewrite clause values, e.g. resolving sample URIs to ids. */
  resolveValues(update: ClauseValueUpdate): SampleQuery {
    return new SampleQuery(updateClauseValues(this.expression, update))
  }

  /** `(not sample:<id>) and …` for each id, the last id outermost. */
  excludingSamples(ids: Iterable<string | number>): SampleQuery {
    let expression = this.expression
    for (const id of ids) {
      expression = makeConjunction(parse(`not sample:${id}`), expression)
    }
    return new SampleQuery(expression)
  }

  criterion<P>(buildClause: ClauseBuilder<P>, algebra: BooleanAlgebra<P>): P {
    return buildQueryCriterion(this.expression, buildClause, algebra)
  }

  toString(): string {
    return this.text
  }
}
