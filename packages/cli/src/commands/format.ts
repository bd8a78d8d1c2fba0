import { object } from '@optique/core/constructs'
import { argument, constant } from '@optique/core/primitives'
import { message } from '@optique/core/message'
import { compose, parse } from '@cohort/query-expressions'
import { expressionArg, maxDepthOption } from '../parsers.js'

export const formatCommand = object({
  cmd: constant('format' as const),
  expression: argument(expressionArg, { description: message`Query expression to format` }),
  maxDepth: maxDepthOption,
})

/** Canonical form of the expression. */
export function handleFormat(opts: { expression: string; maxDepth?: number }): string {
  return compose(parse(opts.expression, { maxDepth: opts.maxDepth }))
}
