import { object } from '@optique/core/constructs'
import { argument, constant } from '@optique/core/primitives'
import { message } from '@optique/core/message'
import { lowerToWhereClause, SampleQuery } from '@cohort/query-expressions'
import { expressionArg, fieldsOption, maxDepthOption } from '../parsers.js'

export const whereCommand = object({
  cmd: constant('where' as const),
  expression: argument(expressionArg, { description: message`Query expression to lower` }),
  fields: fieldsOption,
  maxDepth: maxDepthOption,
})

/** The expression lowered to a WhereClause tree, as JSON. */
export function handleWhere(opts: {
  expression: string
  fields: readonly (readonly string[])[]
  maxDepth?: number
}): string {
  const fields = opts.fields.flat()
  const query = SampleQuery.parse(opts.expression, {
    fields: fields.length > 0 ? fields : undefined,
    maxDepth: opts.maxDepth,
  })
  return JSON.stringify(lowerToWhereClause(query.expression), null, 2)
}
