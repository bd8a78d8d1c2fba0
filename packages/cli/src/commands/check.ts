import { object } from '@optique/core/constructs'
import { argument, constant } from '@optique/core/primitives'
import { message } from '@optique/core/message'
import { Fmt } from '@cohort/core'
import { SampleQuery } from '@cohort/query-expressions'
import { expressionArg, fieldsOption, maxDepthOption, outputOption } from '../parsers.js'

export const checkCommand = object({
  cmd: constant('check' as const),
  expression: argument(expressionArg, { description: message`Query expression to check` }),
  fields: fieldsOption,
  maxDepth: maxDepthOption,
  output: outputOption,
})

export interface CheckReport {
  text: string
  tautology: boolean
  singleton: boolean
  onlyGroupClauses: boolean
}

const LABEL_WIDTH = 20

export function handleCheck(
  opts: {
    expression: string
    fields: readonly (readonly string[])[]
    maxDepth?: number
    output?: 'text' | 'json'
  },
  fmt: Fmt = Fmt.noop,
): string {
  const fields = opts.fields.flat()
  const query = SampleQuery.parse(opts.expression, {
    fields: fields.length > 0 ? fields : undefined,
    maxDepth: opts.maxDepth,
  })

  const report: CheckReport = {
    text: query.text,
    tautology: query.tautology,
    singleton: query.singleton,
    onlyGroupClauses: query.onlyGroupClauses,
  }

  if (opts.output === 'json') return JSON.stringify(report)

  const line = (label: string, value: string) => `${fmt.dim(label.padEnd(LABEL_WIDTH))}${value}`
  const yesNo = (b: boolean) => (b ? fmt.green('yes') : 'no')
  return [
    line('canonical', fmt.bold(report.text)),
    line('tautology', yesNo(report.tautology)),
    line('singleton', yesNo(report.singleton)),
    line('only group clauses', yesNo(report.onlyGroupClauses)),
  ].join('\n')
}
